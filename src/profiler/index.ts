/**
 * Profile generation with ArgyllCMS colprof
 */

export {
  buildColprofInvocation,
  formatInvocation,
  PROFILER_COMMAND,
  SOURCE_FILE_EXTENSIONS,
} from "./flags";
export type { ProfilerServiceShape } from "./service";
export { ProfilerService } from "./service";
export { splitShellWords } from "./shell-words";
export type {
  FlagValue,
  InvocationContext,
  ProfilerInvocation,
  ProfilerResult,
  ProfilerSettings,
} from "./types";
