/**
 * Configuration
 */

export type { ResolvedConfig } from "./loader";
export {
  DEFAULT_PROFILER_SETTINGS,
  loadConfig,
  parseConfig,
  resolveInputPath,
  resolveOutputPath,
} from "./loader";
export type { ProfileConfigInput } from "./schema";
export { ProfileConfigSchema, ProfilerConfigSchema } from "./schema";
