import { diag, type Diagnostic } from "../diagnostics.js";
import { errorMessage, isProfileRepoError, type ErrorKind } from "../errors.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type CommandFailure = { ok: false; exitCode: ExitCode; errors: Diagnostic[] };

const INTEGRITY_KINDS: ReadonlySet<ErrorKind> = new Set(["ChecksumMismatch", "SignatureInvalid"]);
const RESOLUTION_KINDS: ReadonlySet<ErrorKind> = new Set([
  "ConfigNotFound",
  "CircularDependency",
  "InvalidInheritance",
  "DepthExceeded",
  "InvalidConfig",
]);

export function exitCodeFor(err: unknown, fallback: ExitCode = EXIT.BUILD_FAILED): ExitCode {
  if (!isProfileRepoError(err)) return fallback;
  if (INTEGRITY_KINDS.has(err.kind)) return EXIT.INTEGRITY_FAILED;
  if (RESOLUTION_KINDS.has(err.kind)) return EXIT.RESOLUTION_FAILED;
  return fallback;
}

/** Turn a thrown error into a command failure carrying one diagnostic. */
export function failure(err: unknown, fallback: ExitCode = EXIT.BUILD_FAILED): CommandFailure {
  if (isProfileRepoError(err)) {
    const details: Record<string, unknown> = err.chain.length > 0 ? { chain: err.chain } : {};
    return {
      ok: false,
      exitCode: exitCodeFor(err, fallback),
      errors: [diag("error", err.kind, err.message, Object.keys(details).length > 0 ? { details } : undefined)],
    };
  }
  return { ok: false, exitCode: fallback, errors: [diag("error", "UNEXPECTED", errorMessage(err))] };
}
