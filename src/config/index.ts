/** Limits, paths and the `.planloop.yaml` loader. */

export { LIMITS, MEMORY, TOKEN_GUARDS, PATHS } from './defaults.js';
export { loadConfigFile } from './loader.js';
