/**
 * Error taxonomy shared by the build chain, the resolver and the read API.
 * Every error carries a machine-readable `kind` and the HTTP status it maps to.
 */
export type ErrorKind =
  | "ConfigNotFound"
  | "CircularDependency"
  | "InvalidInheritance"
  | "DepthExceeded"
  | "InvalidConfig"
  | "ChecksumMismatch"
  | "SignatureInvalid"
  | "ManifestInvalid"
  | "ProfileFileMissing";

export abstract class ProfileRepoError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly httpStatus: number;

  /** Lookup chain (root-most last visited), when the error came out of a traversal. */
  readonly chain: string[];

  constructor(message: string, chain: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.chain = chain;
  }

  toJSON(): { kind: ErrorKind; message: string; chain?: string[] } {
    return this.chain.length > 0
      ? { kind: this.kind, message: this.message, chain: this.chain }
      : { kind: this.kind, message: this.message };
  }
}

export class ConfigNotFoundError extends ProfileRepoError {
  readonly kind = "ConfigNotFound";
  readonly httpStatus = 404;

  constructor(
    readonly scope: string,
    readonly configName: string,
    chain: string[] = [],
    readonly searched: string[] = [],
  ) {
    super(
      searched.length > 0
        ? `Configuration not found: ${scope}/${configName} (searched ${searched.join(", ")})`
        : `Configuration not found: ${scope}/${configName}`,
      chain,
    );
  }
}

export class CircularDependencyError extends ProfileRepoError {
  readonly kind = "CircularDependency";
  readonly httpStatus = 400;

  /** `[a, b, a]`: starts and ends on the repeated config. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular dependency: ${cycle.join(" -> ")}`, cycle);
    this.cycle = cycle;
  }
}

export class InvalidInheritanceError extends ProfileRepoError {
  readonly kind = "InvalidInheritance";
  readonly httpStatus = 400;
}

export class DepthExceededError extends ProfileRepoError {
  readonly kind = "DepthExceeded";
  readonly httpStatus = 400;

  constructor(readonly maxDepth: number, chain: string[]) {
    super(`Inheritance depth exceeds ${maxDepth}: ${chain.join(" -> ")}`, chain);
  }
}

export class InvalidConfigError extends ProfileRepoError {
  readonly kind = "InvalidConfig";
  readonly httpStatus = 400;
}

export class ChecksumMismatchError extends ProfileRepoError {
  readonly kind = "ChecksumMismatch";
  readonly httpStatus = 409;

  constructor(readonly filePath: string, readonly expected: string, readonly actual: string) {
    super(`Checksum mismatch (${filePath}): manifest=${expected} actual=${actual}`);
  }
}

export class SignatureInvalidError extends ProfileRepoError {
  readonly kind = "SignatureInvalid";
  readonly httpStatus = 409;
}

export class ManifestInvalidError extends ProfileRepoError {
  readonly kind = "ManifestInvalid";
  readonly httpStatus = 422;
}

export class ProfileFileMissingError extends ProfileRepoError {
  readonly kind = "ProfileFileMissing";
  readonly httpStatus = 409;

  constructor(readonly paths: string[]) {
    super(`Profile files missing (unpublish them first): ${paths.join(", ")}`);
  }
}

export function isProfileRepoError(err: unknown): err is ProfileRepoError {
  return err instanceof ProfileRepoError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
