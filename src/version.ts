/**
 * @file version.ts
 * @description Version de wgpeerd (CLI, /health)
 */

export const VERSION = '0.4.2';
