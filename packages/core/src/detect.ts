import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { ProjectFacts } from '@cmdtrust/shared';
import { getErrorMessage } from '@cmdtrust/shared';
import { fileExists, readJsonFile } from '@cmdtrust/storage';
import type { ProjectDetector } from './types.js';

const PackageJsonSchema = z
  .object({
    dependencies: z.record(z.string()).optional(),
    devDependencies: z.record(z.string()).optional(),
  })
  .passthrough();

const JS_TEST_FRAMEWORKS = ['vitest', 'jest', 'mocha'] as const;
const JS_FRAMEWORKS = ['next', 'react', 'vue', 'svelte', 'express', 'fastify'] as const;
const PYTHON_MARKERS = ['pyproject.toml', 'requirements.txt', 'setup.py'] as const;

/**
 * Infers language, package manager and test framework from well-known
 * marker files in the project root. The first ecosystem found wins.
 */
export class MarkerFileDetector implements ProjectDetector {
  async detect(projectRoot: string): Promise<ProjectFacts> {
    const has = (name: string) => fileExists(join(projectRoot, name));

    if (await has('package.json')) {
      return this.detectJavaScript(projectRoot);
    }

    for (const marker of PYTHON_MARKERS) {
      if (await has(marker)) {
        return this.detectPython(projectRoot);
      }
    }

    if (await has('Cargo.toml')) {
      return { language: 'rust', packageManager: 'cargo' };
    }

    if (await has('go.mod')) {
      return { language: 'go', packageManager: 'go' };
    }

    if (await has('pom.xml')) {
      return { language: 'java', packageManager: 'maven' };
    }

    if ((await has('build.gradle')) || (await has('build.gradle.kts'))) {
      return { language: 'java', packageManager: 'gradle' };
    }

    return {};
  }

  private async detectJavaScript(projectRoot: string): Promise<ProjectFacts> {
    const has = (name: string) => fileExists(join(projectRoot, name));
    const facts: ProjectFacts = { language: 'javascript', packageManager: 'npm' };

    if (await has('pnpm-lock.yaml')) {
      facts.packageManager = 'pnpm';
    } else if (await has('yarn.lock')) {
      facts.packageManager = 'yarn';
    }

    const manifest = await this.readPackageJson(projectRoot);
    const dependencies = { ...manifest?.dependencies, ...manifest?.devDependencies };
    facts.testFramework = JS_TEST_FRAMEWORKS.find((name) => name in dependencies);
    facts.framework = JS_FRAMEWORKS.find((name) => name in dependencies);

    return facts;
  }

  private async detectPython(projectRoot: string): Promise<ProjectFacts> {
    const has = (name: string) => fileExists(join(projectRoot, name));
    const facts: ProjectFacts = { language: 'python', packageManager: 'pip' };

    if (await has('uv.lock')) {
      facts.packageManager = 'uv';
    } else if (await has('poetry.lock')) {
      facts.packageManager = 'poetry';
    }

    const declared = [
      await this.readText(join(projectRoot, 'pyproject.toml')),
      await this.readText(join(projectRoot, 'requirements.txt')),
    ].join('\n');

    if ((await has('pytest.ini')) || (await has('conftest.py')) || /\bpytest\b/.test(declared)) {
      facts.testFramework = 'pytest';
    }

    if (await has('manage.py')) {
      facts.framework = 'django';
    } else if (/\bfastapi\b/i.test(declared)) {
      facts.framework = 'fastapi';
    } else if (/\bflask\b/i.test(declared)) {
      facts.framework = 'flask';
    }

    return facts;
  }

  private async readPackageJson(projectRoot: string): Promise<z.infer<typeof PackageJsonSchema> | undefined> {
    const path = join(projectRoot, 'package.json');
    try {
      const parsed = PackageJsonSchema.safeParse(await readJsonFile(path));
      return parsed.success ? parsed.data : undefined;
    } catch (error) {
      console.warn(`[ProjectDetector] Could not read ${path}: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  private async readText(path: string): Promise<string> {
    if (!(await fileExists(path))) {
      return '';
    }
    return readFile(path, 'utf-8');
  }
}
