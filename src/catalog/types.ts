export interface Catalog {
  readonly version: string;
  readonly packages: readonly string[];
  readonly runtimes: readonly string[];
  readonly architectures: readonly string[];
}
