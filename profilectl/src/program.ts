import { Command, InvalidArgumentError } from "commander";
import { startServer } from "./api/server.js";
import { build, unpublish } from "./commands/build.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import { install } from "./commands/install.js";
import { listProfiles } from "./commands/list.js";
import { listDependencies, openResolver, resolveTarget } from "./commands/resolve.js";
import { failure } from "./commands/result.js";
import { validateAll } from "./commands/validate.js";
import { verifyRepository } from "./commands/verify.js";
import { CONFIG_DIR } from "./config/loader.js";
import { loadValidatedConfig } from "./config/validator.js";
import { createReporter, diag, isOutputFormat, type Diagnostic, type OutputFormat, type Reporter } from "./diagnostics.js";
import { NonInteractiveDecisions, PromptDecisions, type DecisionProvider } from "./manifest/decisions.js";
import { isBumpKind } from "./manifest/version.js";
import { validateResolved } from "./resolver/validate.js";
import { createRegistry } from "./schema/registry.js";
import { createSigner, loadVerifier, type SigningOptions } from "./signing/index.js";
import type { BumpKind } from "./types/manifest.js";

export const DEFAULT_PASSPHRASE_ENV = "PROFILE_SIGNING_PASSPHRASE";

export type CliIO = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  env: NodeJS.ProcessEnv;
  setExitCode(code: ExitCode): void;
};

type GlobalOpts = { config: string; env?: string; format: string };

type SignOpts = { keyFile?: string; passphraseEnv: string; gpgKeyId?: string };

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) throw new InvalidArgumentError("Output format must be human or jsonl.");
  return value;
}

function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Not a non-negative integer.");
  return Number(value);
}

function parseBump(value: string): BumpKind {
  if (!isBumpKind(value)) throw new InvalidArgumentError("Bump kind must be major, minor or patch.");
  return value;
}

function withSigningOptions(cmd: Command): Command {
  return cmd
    .option("--key-file <path>", "Armored OpenPGP private key")
    .option("--passphrase-env <var>", "Environment variable holding the key passphrase", DEFAULT_PASSPHRASE_ENV)
    .option("--gpg-key-id <id>", "Sign with this key from the local gpg keyring instead");
}

export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name("profilectl")
    .description("Signed slicer-profile repositories: build, verify, resolve")
    .version("0.1.0")
    .option("--config <path>", "Path to profilectl config directory", CONFIG_DIR)
    .option("--env <name>", "Config overlay to load (config/<name>.yaml)")
    .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  const globals = (): { format: OutputFormat; configDir: string; envName?: string } => {
    const g = program.opts<GlobalOpts>();
    return { format: isOutputFormat(g.format) ? g.format : "human", configDir: g.config, envName: g.env };
  };

  const reporter = (): Reporter => createReporter(globals().format, { stdout: io.stdout, stderr: io.stderr });

  const loadConfig = () => {
    const g = globals();
    return loadValidatedConfig({ envName: g.envName, configDir: g.configDir, env: io.env });
  };

  const fail = (out: Reporter, errors: Diagnostic[], code: ExitCode): void => {
    for (const err of errors) out.report(err);
    io.setExitCode(code);
  };

  const signingOptions = (opts: SignOpts): SigningOptions | null => {
    if (opts.gpgKeyId && opts.keyFile) return null;
    if (opts.gpgKeyId) return { gpgKeyId: opts.gpgKeyId };
    if (opts.keyFile) return { keyFile: opts.keyFile, passphrase: io.env[opts.passphraseEnv] };
    return null;
  };

  withSigningOptions(
    program
      .command("build")
      .description("Scan a repository, version changed profiles, sign and publish manifest.json")
      .argument("<repo>", "Repository root")
      .option("--non-interactive", "Never prompt: guess new profile metadata and use --bump for changes")
      .option("--namespace <ns>", "Namespace for a first build")
      .option("--bump <kind>", "Bump kind for changed profiles in non-interactive mode", parseBump, "patch"),
  ).action(async (repo: string, opts: SignOpts & { nonInteractive?: boolean; namespace?: string; bump: BumpKind }) => {
    const out = reporter();
    const signing = signingOptions(opts);
    if (!signing) {
      fail(out, [diag("error", "SIGNING_KEY_REQUIRED", "Give exactly one of --key-file or --gpg-key-id")], EXIT.INVALID_ARGS);
      return;
    }
    const prompts = opts.nonInteractive || !io.stdin.isTTY ? null : new PromptDecisions({ input: io.stdin, output: io.stdout });
    try {
      const config = await loadConfig();
      const decisions: DecisionProvider = prompts ?? new NonInteractiveDecisions({ namespace: opts.namespace, bump: opts.bump });
      const res = await build({ repoRoot: repo, config, signer: await createSigner(signing), decisions });
      if (!res.ok) {
        fail(out, res.errors, res.exitCode);
        return;
      }
      for (const p of res.summary.added) out.report(diag("info", "PROFILE_ADDED", `added ${p}`, { path: p }));
      for (const u of res.summary.updated) {
        out.report(diag("info", "PROFILE_UPDATED", `updated ${u.path} ${u.from} -> ${u.to}`, { path: u.path, details: { from: u.from, to: u.to } }));
      }
      out.report(
        res.published
          ? diag("info", "PUBLISHED", `Published ${res.manifest.profiles.length} profiles to ${res.published.manifest}`)
          : diag("info", "UNCHANGED", "Nothing changed; manifest left as it was"),
      );
    } catch (e) {
      const f = failure(e, EXIT.BUILD_FAILED);
      fail(out, f.errors, f.exitCode);
    } finally {
      prompts?.close();
    }
  });

  withSigningOptions(
    program
      .command("unpublish")
      .description("Remove profiles (by uuid or path) from the manifest and re-sign it")
      .argument("<repo>", "Repository root")
      .argument("<selectors...>", "Profile uuids or repository paths"),
  ).action(async (repo: string, selectors: string[], opts: SignOpts) => {
    const out = reporter();
    const signing = signingOptions(opts);
    if (!signing) {
      fail(out, [diag("error", "SIGNING_KEY_REQUIRED", "Give exactly one of --key-file or --gpg-key-id")], EXIT.INVALID_ARGS);
      return;
    }
    try {
      const res = await unpublish({ repoRoot: repo, selectors, signer: await createSigner(signing) });
      if (!res.ok) {
        fail(out, res.errors, res.exitCode);
        return;
      }
      for (const p of res.removed) out.report(diag("info", "PROFILE_REMOVED", `removed ${p.name} (${p.uuid})`, { path: p.path }));
    } catch (e) {
      const f = failure(e, EXIT.BUILD_FAILED);
      fail(out, f.errors, f.exitCode);
    }
  });

  program
    .command("verify")
    .description("Check the manifest signature and every checksum of a repository")
    .argument("<repo>", "Repository root")
    .requiredOption("--public-key <path>", "Pinned armored public key")
    .action(async (repo: string, opts: { publicKey: string }) => {
      const out = reporter();
      try {
        const res = await verifyRepository({ repoRoot: repo, verifier: await loadVerifier(opts.publicKey) });
        if (!res.ok) {
          fail(out, res.errors, res.exitCode);
          return;
        }
        out.report(diag("info", "OK", `OK: ${res.profiles} profiles, ${res.files} files verified`));
      } catch (e) {
        const f = failure(e, EXIT.INTEGRITY_FAILED);
        fail(out, f.errors, f.exitCode);
      }
    });

  program
    .command("resolve")
    .description("Print the fully resolved config of a profile")
    .argument("<repo>", "Repository root")
    .argument("<slicer>", "Slicer name")
    .argument("<type>", "Profile type directory")
    .argument("<path>", "Path below <slicer>/<type>/")
    .option("--source-map", "Include the field provenance map")
    .option("--validate", "Check the resolved config against the document schema")
    .action(async (repo: string, slicer: string, type: string, relPath: string, opts: { sourceMap?: boolean; validate?: boolean }) => {
      const out = reporter();
      try {
        const config = await loadConfig();
        const res = resolveTarget(openResolver(repo, config), { slicer, type, path: relPath });
        if (!res.ok) {
          fail(out, res.errors, res.exitCode);
          return;
        }
        const body: Record<string, unknown> = {
          resolved_config: res.resolved_config,
          inheritance_chain: res.inheritance_chain,
          instantiable: res.instantiable,
        };
        if (opts.sourceMap) body.source_map = res.source_map;
        if (opts.validate) body.validation_errors = await validateResolved(await createRegistry(), res);
        out.data(body);
      } catch (e) {
        const f = failure(e, EXIT.RESOLUTION_FAILED);
        fail(out, f.errors, f.exitCode);
      }
    });

  program
    .command("deps")
    .description("List the inheritance ancestors of a profile")
    .argument("<repo>", "Repository root")
    .argument("<slicer>", "Slicer name")
    .argument("<type>", "Profile type directory")
    .argument("<path>", "Path below <slicer>/<type>/")
    .option("--tree", "Add the nested dependency tree")
    .option("--depth <n>", "Keep only the n nearest ancestors", parseNonNegativeInt)
    .option("--metadata", "Include each document's metadata")
    .action(async (repo: string, slicer: string, type: string, relPath: string, opts: { tree?: boolean; depth?: number; metadata?: boolean }) => {
      const out = reporter();
      try {
        const config = await loadConfig();
        const res = listDependencies(openResolver(repo, config), { slicer, type, path: relPath }, {
          depth: opts.depth,
          tree: opts.tree,
          includeMetadata: opts.metadata,
        });
        if (!res.ok) {
          fail(out, res.errors, res.exitCode);
          return;
        }
        const { ok: _ok, ...report } = res;
        out.data(report);
      } catch (e) {
        const f = failure(e, EXIT.RESOLUTION_FAILED);
        fail(out, f.errors, f.exitCode);
      }
    });

  program
    .command("install")
    .description("Install a profile and its dependencies from verified repositories")
    .argument("<repo>", "Repository root")
    .argument("<profile>", "Profile name or namespace/name")
    .requiredOption("--slicer <slicer>", "Slicer the profile is for")
    .requiredOption("--public-key <path>", "Pinned armored public key")
    .requiredOption("--dest <dir>", "Destination directory")
    .option("--extra-repo <dirs...>", "More repositories to search")
    .action(
      async (repo: string, query: string, opts: { slicer: string; publicKey: string; dest: string; extraRepo?: string[] }) => {
        const out = reporter();
        try {
          const res = await install({
            repoRoots: [repo, ...(opts.extraRepo ?? [])],
            query,
            slicer: opts.slicer,
            dest: opts.dest,
            verifier: await loadVerifier(opts.publicKey),
          });
          if (!res.ok) {
            fail(out, res.errors, res.exitCode);
            return;
          }
          for (const w of res.warnings) out.report(w);
          for (const f of res.files) out.report(diag("info", "INSTALLED", `installed ${f}`, { path: f }));
        } catch (e) {
          const f = failure(e, EXIT.INTEGRITY_FAILED);
          fail(out, f.errors, f.exitCode);
        }
      },
    );

  program
    .command("list")
    .description("List the profiles of verified repositories")
    .argument("<repos...>", "Repository roots")
    .requiredOption("--public-key <path>", "Pinned armored public key")
    .option("--slicer <slicer>", "Only profiles for this slicer")
    .action(async (repos: string[], opts: { publicKey: string; slicer?: string }) => {
      const out = reporter();
      try {
        const res = await listProfiles({ repoRoots: repos, slicer: opts.slicer, verifier: await loadVerifier(opts.publicKey) });
        if (!res.ok) {
          fail(out, res.errors, res.exitCode);
          return;
        }
        for (const { namespace, profile } of res.profiles) {
          out.report(
            diag("info", "PROFILE", `${namespace}/${profile.name} (v${profile.version}) [${profile.slicer}]`, {
              path: profile.path,
              details: { uuid: profile.uuid },
            }),
          );
        }
      } catch (e) {
        const f = failure(e, EXIT.INTEGRITY_FAILED);
        fail(out, f.errors, f.exitCode);
      }
    });

  program
    .command("serve")
    .description("Serve the read API for a repository")
    .argument("<repo>", "Repository root")
    .option("--port <n>", "Port (default from config)", parseNonNegativeInt)
    .option("--host <host>", "Interface to bind", "127.0.0.1")
    .action(async (repo: string, opts: { port?: number; host: string }) => {
      const out = reporter();
      try {
        const config = await loadConfig();
        const server = await startServer({
          resolver: openResolver(repo, config),
          registry: await createRegistry(),
          reporter: out,
          port: opts.port ?? config.server.port,
          host: opts.host,
        });
        process.once("SIGINT", () => server.close());
        process.once("SIGTERM", () => server.close());
      } catch (e) {
        const f = failure(e, EXIT.INVALID_ARGS);
        fail(out, f.errors, f.exitCode);
      }
    });

  program
    .command("validate")
    .description("Validate the profilectl config and (optionally) a repository")
    .option("--repo <path>", "Repository root to check")
    .action(async (opts: { repo?: string }) => {
      const out = reporter();
      const g = globals();
      const res = await validateAll({ configDir: g.configDir, envName: g.envName, repoRoot: opts.repo, env: io.env });
      if (!res.ok) {
        fail(out, res.errors, EXIT.BUILD_FAILED);
        return;
      }
      for (const w of res.warnings) out.report(w);
      out.report(diag("info", "OK", "OK"));
    });

  return program;
}
