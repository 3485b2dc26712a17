export { HeuristicCommandProvider } from './heuristic.js';
export { StaticCommandProvider } from './static.js';
