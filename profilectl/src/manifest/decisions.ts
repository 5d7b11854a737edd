import path from "node:path";
import { createInterface, type Interface } from "node:readline";
import type { BumpKind, Profile } from "../types/manifest.js";
import type { ScanResult, ScannedFile } from "./scanner.js";
import { isBumpKind } from "./version.js";

export type NewProfileMeta = {
  name: string;
  slicer: string;
  type: string;
};

/**
 * Supplies the choices a human makes during a build. The builder itself never
 * prompts; it only consumes what a provider returns.
 */
export interface DecisionProvider {
  /** Asked once, on the first build of a repository. */
  namespace(suggested: string): Promise<string>;
  newProfile(file: ScannedFile, guess: NewProfileMeta): Promise<NewProfileMeta>;
  bumpKind(profile: Profile, file: ScannedFile): Promise<BumpKind>;
}

export type BuildDecisions = {
  namespace: string;
  /** Keyed by repository-relative path. */
  newProfiles: Map<string, NewProfileMeta>;
  bumps: Map<string, BumpKind>;
};

/**
 * Guess metadata from `<slicer>/<type>/.../<file>` under the configs directory.
 * Shallower paths fall back to "unknown".
 */
export function guessProfileMeta(file: Pick<ScannedFile, "configPath">): NewProfileMeta {
  const parts = file.configPath.split("/");
  const stem = path.posix.basename(file.configPath, path.posix.extname(file.configPath));
  return {
    name: stem,
    slicer: parts.length >= 2 ? parts[0] : "unknown",
    type: parts.length >= 3 ? parts[1] : "unknown",
  };
}

/** Ask the provider for everything the scan needs, in scan order. */
export async function collectDecisions(
  scan: ScanResult,
  hasPrevious: { namespace: string } | null,
  provider: DecisionProvider,
  suggestedNamespace: string,
): Promise<BuildDecisions> {
  const namespace = hasPrevious ? hasPrevious.namespace : await provider.namespace(suggestedNamespace);
  const newProfiles = new Map<string, NewProfileMeta>();
  const bumps = new Map<string, BumpKind>();

  for (const file of scan.files) {
    if (file.kind !== "profile") continue;
    if (file.status === "new") {
      newProfiles.set(file.path, await provider.newProfile(file, guessProfileMeta(file)));
    } else if (file.status === "modified" && file.previous) {
      bumps.set(file.path, await provider.bumpKind(file.previous, file));
    }
  }

  return { namespace, newProfiles, bumps };
}

/** CI mode: guessed metadata, one bump kind for every modified profile. */
export class NonInteractiveDecisions implements DecisionProvider {
  constructor(private readonly opts: { namespace?: string; bump?: BumpKind } = {}) {}

  async namespace(suggested: string): Promise<string> {
    return this.opts.namespace ?? suggested;
  }

  async newProfile(_file: ScannedFile, guess: NewProfileMeta): Promise<NewProfileMeta> {
    return guess;
  }

  async bumpKind(): Promise<BumpKind> {
    return this.opts.bump ?? "patch";
  }
}

export type PromptStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

/**
 * Interactive prompts. Empty answers take the default shown in brackets; at
 * end of input every remaining question takes its default. Call `close` when done.
 */
export class PromptDecisions implements DecisionProvider {
  private rl: Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(private readonly streams: PromptStreams = { input: process.stdin, output: process.stdout }) {}

  async namespace(suggested: string): Promise<string> {
    const answer = await this.ask(`Enter a namespace for this repository [${suggested}]: `);
    return answer || suggested;
  }

  async newProfile(file: ScannedFile, guess: NewProfileMeta): Promise<NewProfileMeta> {
    this.streams.output.write(`\n--- Found new profile: ${file.path} ---\n`);
    const name = (await this.ask(`Profile display name [${guess.name}]: `)) || guess.name;
    const slicer = (await this.ask(`Slicer [${guess.slicer}]: `)) || guess.slicer;
    const type = (await this.ask(`Profile type [${guess.type}]: `)) || guess.type;
    return { name, slicer, type };
  }

  async bumpKind(profile: Profile, file: ScannedFile): Promise<BumpKind> {
    this.streams.output.write(`\n--- Profile '${profile.name}' changed (${file.path}), current version ${profile.version} ---\n`);
    for (;;) {
      const answer = (await this.ask("Version bump (major, minor, patch) [patch]: ")).toLowerCase();
      if (answer === "") return "patch";
      if (isBumpKind(answer)) return answer;
      this.streams.output.write(`Unknown bump kind: ${answer}\n`);
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
    this.lines = null;
  }

  private async ask(question: string): Promise<string> {
    if (!this.lines) {
      this.rl = createInterface({ input: this.streams.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    this.streams.output.write(question);
    const next = await this.lines.next();
    return next.done ? "" : next.value.trim();
  }
}
