export { createVerifierHandler, evaluate } from "./handler.js";
export type {
  VerifierHandler,
  VerifierHandlerDependencies,
} from "./handler.js";
export {
  createPythonProbe,
  layerSearchPath,
  parseLoadResult,
} from "./python-probe.js";
export type { PythonProbe, PythonProbeOptions } from "./python-probe.js";
export type {
  ExpectedIdentity,
  LoadResult,
  ModuleLoader,
  ObservedIdentity,
  RuntimeIntrospector,
  Verdict,
  VerdictStatus,
  VerifierResponseData,
} from "./types.js";
export {
  INSTALLED,
  NOT_AVAILABLE,
  NOT_INSTALLED,
  VERSION_NOT_FOUND,
  computeVerdict,
  emptyVerifierResponse,
  failedVerdict,
  formatVerdictMessage,
  installedVersion,
  normalizeArchitecture,
  readExpectations,
  toVerifierResponse,
} from "./verdict.js";
