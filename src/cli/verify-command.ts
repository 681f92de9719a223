import { deriveImportName } from "../builder/naming.js";
import type { LayerproofConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import { createRecordingTransport } from "../protocol/recording-transport.js";
import type { ReportFormat } from "../report/types.js";
import { createVerifierHandler } from "../verifier/handler.js";
import { createPythonProbe } from "../verifier/python-probe.js";
import type { ModuleLoader, RuntimeIntrospector } from "../verifier/types.js";
import { LOCAL_LOG_STREAM, synthesizeEvent } from "./events.js";
import { renderResult, type CommandResult } from "./output.js";

export interface VerifyOptions {
  readonly packageName?: string;
  readonly importName?: string;
  readonly version?: string;
  readonly runtime?: string;
  readonly architecture?: string;
  readonly format: ReportFormat;
}

export interface VerifyCollaborators {
  readonly introspector?: RuntimeIntrospector;
  readonly loader?: ModuleLoader;
}

export async function runVerifyCommand(
  options: VerifyOptions,
  config: LayerproofConfig,
  logger: Logger,
  toolVersion: string,
  collaborators: VerifyCollaborators = {},
): Promise<CommandResult> {
  const probe = createPythonProbe({
    pythonExecutable: config.pythonExecutable,
    layerRoot: config.layerRoot,
  });
  const transport = createRecordingTransport();
  const handler = createVerifierHandler({
    introspector: collaborators.introspector ?? probe,
    loader: collaborators.loader ?? probe,
    transport,
    logger,
  });

  const importName =
    options.importName ??
    (options.packageName ? deriveImportName(options.packageName) : undefined);
  const event = synthesizeEvent("LayerVerifier", {
    PackageName: options.packageName,
    PackageImportName: importName,
    PackageVersion: options.version,
    Runtime: options.runtime,
    Architecture: options.architecture,
  });
  await handler(event, { logStreamName: LOCAL_LOG_STREAM });
  return renderResult(
    "verifier",
    transport.last(),
    options.format,
    toolVersion,
  );
}
