export type VerdictStatus = "SUCCESS" | "FAILED";

export interface ExpectedIdentity {
  readonly packageName: string;
  readonly importName: string;
  readonly version: string;
  readonly runtime: string;
  readonly architecture: string;
}

/** Outcome of importing a module; "not installed" is a value, not an error. */
export type LoadResult =
  | { readonly loaded: true; readonly version: string | null }
  | { readonly loaded: false };

export interface ObservedIdentity {
  readonly runtime: string;
  readonly architecture: string;
  readonly module: LoadResult;
}

export interface Verdict {
  readonly status: VerdictStatus;
  readonly message: string;
  readonly testPackage: string;
  readonly testPackageVersion: string;
  readonly testRuntime: string;
  readonly testArchitecture: string;
}

export interface RuntimeIntrospector {
  /** Interpreter identifier such as python3.13. */
  runtime(): Promise<string>;
  /** Raw machine name as the platform reports it. */
  architecture(): string;
}

export interface ModuleLoader {
  load(importName: string, runtime: string): Promise<LoadResult>;
}

export interface VerifierResponseData {
  readonly Status: string;
  readonly Message: string;
  readonly TestPackage: string;
  readonly TestPackageVersion: string;
  readonly TestRuntime: string;
  readonly TestArchitecture: string;
  readonly [field: string]: string;
}
