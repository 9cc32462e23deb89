import type { UserToolModule } from './user-modules.js';
import type {
  ExportedTool,
  RegistrySnapshot,
  RegistryWarning,
  ToolBinding,
  ToolDefinition,
  ToolDescriptor,
  ToolOrigin,
  ToolParameter,
} from './types.js';
import type { CapabilitySource } from '../supervisor/types.js';
import type { JsonSchema, LogFn } from '../types.js';

import { ConfigError, FatalError } from '../errors.js';
import { createLogEntry, noopLog } from '../types.js';
import { isValidToolName } from '../utils.js';
import { fingerprintOf } from '../utils/hash.js';
import { stableStringify } from '../utils/stable-stringify.js';

import { parametersToSchema, schemaToParameters } from './schema.js';
import { scanUserModules } from './user-modules.js';

export interface ToolRegistryOptions {
  capabilities?: CapabilitySource;
  log?: LogFn;
  now?: () => number;
}

interface Candidate {
  descriptor: ToolDescriptor;
  // Distinguishes otherwise identical definitions, e.g. a rewritten user file.
  revision: string;
}

const freezeDescriptor = (
  name: string,
  description: string,
  parameters: readonly ToolParameter[],
  inputSchema: JsonSchema,
  origin: ToolOrigin,
  binding: ToolBinding,
  invoke: ToolDescriptor['invoke']
): ToolDescriptor => Object.freeze({
  name,
  description,
  parameters: Object.freeze(parameters.map((param) => Object.freeze({ ...param }))),
  inputSchema: Object.freeze(structuredClone(inputSchema)),
  origin,
  binding: Object.freeze(binding),
  invoke,
});

const fromDefinition = (definition: ToolDefinition, origin: 'builtin' | 'user-loaded', file?: string): ToolDescriptor => {
  const { handler } = definition;
  const binding: ToolBinding = origin === 'builtin'
    ? { kind: 'builtin', handler }
    : { kind: 'user-loaded', handler, file: file ?? '' };
  return freezeDescriptor(
    definition.name,
    definition.description,
    definition.parameters,
    parametersToSchema(definition.parameters),
    origin,
    binding,
    async (args, ctx) => await Promise.resolve(handler(args, ctx))
  );
};

const createSnapshot = (
  version: number,
  fingerprint: string,
  createdAt: number,
  descriptors: readonly ToolDescriptor[],
  warnings: readonly RegistryWarning[]
): RegistrySnapshot => {
  const list = Object.freeze([...descriptors]);
  const byName = new Map(list.map((descriptor) => [descriptor.name, descriptor]));
  return Object.freeze({
    version,
    fingerprint,
    createdAt,
    warnings: Object.freeze(warnings.map((warning) => Object.freeze({ ...warning }))),
    size: list.length,
    get: (name: string) => byName.get(name),
    has: (name: string) => byName.has(name),
    list: () => list,
    export: (): ExportedTool[] => list.map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      input_schema: structuredClone(descriptor.inputSchema),
    })),
  });
};

/**
 * Merges builtin, user-loaded and external tools into versioned, immutable snapshots.
 * Name conflicts resolve builtin > user-loaded > external; between external providers
 * the lexically lower provider id wins. Every dropped tool leaves a warning.
 */
export class ToolRegistry {
  private builtins?: Candidate[];
  private userDirectory?: string;
  private userModules: UserToolModule[] = [];
  private userDiagnostics: RegistryWarning[] = [];
  private current?: RegistrySnapshot;
  private version = 0;
  private dirty = true;
  private seenToken = Number.NaN;
  private readonly capabilities?: CapabilitySource;
  private readonly log: LogFn;
  private readonly now: () => number;

  constructor(options: ToolRegistryOptions = {}) {
    this.capabilities = options.capabilities;
    this.log = options.log ?? noopLog;
    this.now = options.now ?? Date.now;
  }

  loadBuiltins(catalog: readonly ToolDefinition[]): void {
    if (this.builtins !== undefined) {
      throw new ConfigError('builtin tools are already loaded');
    }
    const seen = new Set<string>();
    this.builtins = catalog.map((definition) => {
      if (!isValidToolName(definition.name)) {
        throw new ConfigError(`builtin tool name '${definition.name}' is invalid`);
      }
      if (seen.has(definition.name)) {
        throw new ConfigError(`builtin tool '${definition.name}' is defined twice`);
      }
      seen.add(definition.name);
      return { descriptor: fromDefinition(definition, 'builtin'), revision: '' };
    });
    this.dirty = true;
  }

  /** Scans `directory` for user tool modules; returns the diagnostics of this scan. */
  async loadUserModules(directory: string): Promise<RegistryWarning[]> {
    this.userDirectory = directory;
    const scan = await scanUserModules(directory);
    this.userModules = scan.modules;
    this.userDiagnostics = scan.diagnostics;
    scan.diagnostics.forEach((diagnostic) => {
      this.emit('WRN', `${diagnostic.source}: ${diagnostic.message}`);
    });
    const count = scan.modules.reduce((sum, module) => sum + module.definitions.length, 0);
    this.emit('VRB', `loaded ${String(count)} user tools from ${String(scan.modules.length)} modules in ${directory}`);
    this.dirty = true;
    return scan.diagnostics;
  }

  /** Re-scans user modules, re-reads provider capabilities and returns the resulting snapshot. */
  async reload(): Promise<RegistrySnapshot> {
    if (this.userDirectory !== undefined) {
      await this.loadUserModules(this.userDirectory);
    }
    this.dirty = true;
    return this.snapshot();
  }

  snapshot(): RegistrySnapshot {
    const token = this.capabilities?.capabilityToken ?? 0;
    if (!this.dirty && token === this.seenToken && this.current !== undefined) {
      return this.current;
    }
    this.dirty = false;
    this.seenToken = token;

    const { descriptors, warnings, revisions } = this.merge();
    const fingerprint = fingerprintOf(descriptors.map((descriptor, index) => ({
      name: descriptor.name,
      description: descriptor.description,
      origin: descriptor.origin,
      schema: descriptor.inputSchema,
      revision: revisions[index],
    })));
    if (this.current?.fingerprint === fingerprint) {
      if (stableStringify(this.current.warnings) === stableStringify(warnings)) return this.current;
      // Only the diagnostics moved: same tools, same version.
      this.current = createSnapshot(this.current.version, fingerprint, this.now(), descriptors, warnings);
      return this.current;
    }
    this.version += 1;
    warnings.forEach((warning) => {
      if (warning.kind === 'name_conflict' || warning.kind === 'invalid_name') {
        this.emit('WRN', warning.message);
      }
    });
    this.current = createSnapshot(this.version, fingerprint, this.now(), descriptors, warnings);
    this.emit('VRB', `registry snapshot v${String(this.version)}: ${String(descriptors.length)} tools`);
    return this.current;
  }

  private merge(): { descriptors: ToolDescriptor[]; warnings: RegistryWarning[]; revisions: string[] } {
    const warnings: RegistryWarning[] = [...this.userDiagnostics];
    const ordered: Candidate[] = [
      ...(this.builtins ?? []),
      ...this.userCandidates(),
      ...this.externalCandidates(warnings),
    ];
    // Candidates arrive in priority order, so the first holder of a name wins.
    const winners = new Map<string, Candidate>();
    ordered.forEach((candidate) => {
      const { name, origin } = candidate.descriptor;
      const holder = winners.get(name);
      if (holder === undefined) {
        winners.set(name, candidate);
        return;
      }
      warnings.push({
        kind: 'name_conflict',
        source: origin,
        message: `tool '${name}' from ${origin} dropped: name already provided by ${holder.descriptor.origin}`,
      });
    });
    const kept = Array.from(winners.values());
    return {
      descriptors: kept.map((candidate) => candidate.descriptor),
      warnings,
      revisions: kept.map((candidate) => candidate.revision),
    };
  }

  private userCandidates(): Candidate[] {
    return this.userModules.flatMap((module) => module.definitions.map((definition) => ({
      descriptor: fromDefinition(definition, 'user-loaded', module.file),
      revision: module.revision,
    })));
  }

  private externalCandidates(warnings: RegistryWarning[]): Candidate[] {
    const source = this.capabilities;
    if (source === undefined) return [];
    return [...source.capabilities()]
      .sort((a, b) => (a.providerId < b.providerId ? -1 : a.providerId > b.providerId ? 1 : 0))
      .flatMap((capability) => {
        const origin: ToolOrigin = `external:${capability.providerId}`;
        return capability.tools.flatMap((tool) => {
          const name = `${capability.prefix ?? ''}${tool.name}`;
          if (!isValidToolName(name)) {
            warnings.push({ kind: 'invalid_name', source: origin, message: `tool '${name}' from ${origin} skipped: invalid tool name` });
            return [];
          }
          const { providerId } = capability;
          const remoteName = tool.name;
          const descriptor = freezeDescriptor(
            name,
            tool.description,
            schemaToParameters(tool.inputSchema),
            tool.inputSchema,
            origin,
            { kind: 'external', providerId, remoteName },
            async (args, ctx) => await source.invoke(providerId, remoteName, args, ctx.timeoutMs)
          );
          return [{ descriptor, revision: '' }];
        });
      });
  }

  private emit(severity: 'VRB' | 'WRN', message: string): void {
    this.log(createLogEntry('registry', severity, 'registry', message));
  }
}

/** Checks the invariants a bound snapshot must hold; any breach is fatal for the session. */
export function assertSnapshotIntegrity(snapshot: RegistrySnapshot): void {
  if (!Object.isFrozen(snapshot)) {
    throw new FatalError('registry snapshot is mutable', { version: snapshot.version });
  }
  const list = snapshot.list();
  if (list.length !== snapshot.size) {
    throw new FatalError(`registry snapshot v${String(snapshot.version)} reports ${String(snapshot.size)} tools but lists ${String(list.length)}`);
  }
  const seen = new Set<string>();
  list.forEach((descriptor) => {
    if (seen.has(descriptor.name)) {
      throw new FatalError(`registry snapshot v${String(snapshot.version)} holds duplicate tool '${descriptor.name}'`);
    }
    seen.add(descriptor.name);
    if (typeof descriptor.invoke !== 'function' || snapshot.get(descriptor.name) !== descriptor) {
      throw new FatalError(`registry snapshot v${String(snapshot.version)} has a broken binding for '${descriptor.name}'`);
    }
  });
}
