import { StagingError, type Result } from "../errors.js";
import {
  describeCommandFailure,
  execCommand,
  type CommandRunner,
} from "../exec/command.js";
import type { PackageInstaller } from "./types.js";

export interface PipInstallerOptions {
  readonly pythonExecutable: string;
  readonly run?: CommandRunner;
}

/** Installs exactly name==version into a target directory with pip. */
export function createPipInstaller(
  options: PipInstallerOptions,
): PackageInstaller {
  const run = options.run ?? execCommand;

  return {
    async install(
      name: string,
      version: string,
      targetDir: string,
    ): Promise<Result<void>> {
      const args = pipInstallArgs(name, version, targetDir);
      try {
        await run(options.pythonExecutable, args);
        return { ok: true, value: undefined };
      } catch (error) {
        return {
          ok: false,
          error: new StagingError(
            `pip install ${name}==${version} failed: ${describeCommandFailure(error)}`,
            { cause: error },
          ),
        };
      }
    },
  };
}

export function pipInstallArgs(
  name: string,
  version: string,
  targetDir: string,
): string[] {
  return [
    "-m",
    "pip",
    "install",
    "-q",
    `${name}==${version}`,
    "--target",
    targetDir,
    "--no-cache-dir",
    "--disable-pip-version-check",
  ];
}
