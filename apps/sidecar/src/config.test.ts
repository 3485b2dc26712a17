import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('defaults to the working directory', () => {
    const config = loadConfig({}, '/work/project');

    expect(config.projectRoot).toBe('/work/project');
    expect(config.protocol.ledger?.dataDirName).toBeUndefined();
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        CMDTRUST_PROJECT_ROOT: 'services/api',
        CMDTRUST_DATA_DIR: '.trust',
        CMDTRUST_VERIFY_TIMEOUT_MS: '5000',
        CMDTRUST_RUN_TIMEOUT_MS: '60000',
      },
      '/work',
    );

    expect(config).toEqual({
      projectRoot: '/work/services/api',
      protocol: {
        ledger: { dataDirName: '.trust' },
        config: { verificationTimeoutMs: 5000, trustedRunTimeoutMs: 60000 },
      },
    });
  });

  it('rejects non-numeric timeouts', () => {
    expect(() => loadConfig({ CMDTRUST_RUN_TIMEOUT_MS: 'soon' }, '/work')).toThrow(
      /Invalid environment: CMDTRUST_RUN_TIMEOUT_MS/,
    );
  });
});
