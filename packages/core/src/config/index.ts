export type { RunConfig } from './run-config';
export { getRunConfig, loadRunConfig, resetRunConfig } from './run-config';
