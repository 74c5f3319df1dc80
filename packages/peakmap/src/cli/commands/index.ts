export { runBuild, type BuildCommandDeps, type BuildResult } from './build.js';
export { runValidate, type ValidateOptions, type ValidateCommandResult } from './validate.js';
export { runRegions, describeRegions, type RegionRow } from './regions.js';
export type { CommandContext } from './context.js';
