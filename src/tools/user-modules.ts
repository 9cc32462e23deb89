import fs from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { z } from 'zod';

import type { RegistryWarning, ToolDefinition, ToolHandler } from './types.js';

import { errorMessage } from '../errors.js';
import { TOOL_NAME_PATTERN, isPlainObject } from '../utils.js';

const MODULE_EXTENSIONS = new Set(['.js', '.mjs']);

const parameterSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['string', 'number', 'integer', 'boolean', 'object', 'array', 'any']),
  required: z.boolean().default(true),
  description: z.string().optional(),
});

const definitionSchema = z.object({
  name: z.string().regex(TOOL_NAME_PATTERN, 'must match [A-Za-z0-9][A-Za-z0-9_-]{0,63}'),
  description: z.string().min(1),
  parameters: z.array(parameterSchema).default([]),
  handler: z.custom<ToolHandler>((value) => typeof value === 'function', { message: 'must be a function' }),
}).superRefine((definition, ctx) => {
  const seen = new Set<string>();
  definition.parameters.forEach((param, index) => {
    if (seen.has(param.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['parameters', index, 'name'], message: `duplicate parameter '${param.name}'` });
    }
    seen.add(param.name);
  });
});

export interface UserToolModule {
  file: string;
  // mtime and size; changes whenever the file is rewritten.
  revision: string;
  definitions: ToolDefinition[];
}

export interface UserModuleScan {
  modules: UserToolModule[];
  diagnostics: RegistryWarning[];
}

const describeIssues = (error: z.ZodError): string => error.issues
  .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(definition)'}: ${issue.message}`)
  .join('; ');

const labelOf = (candidate: unknown, index: number): string => (
  isPlainObject(candidate) && typeof candidate.name === 'string' ? candidate.name : `#${String(index)}`
);

const exportedCandidates = (record: unknown): unknown[] | undefined => {
  if (!isPlainObject(record)) return undefined;
  if (Array.isArray(record.tools)) return record.tools;
  if (Array.isArray(record.default)) return record.default;
  return undefined;
};

const listModuleFiles = async (directory: string): Promise<string[] | undefined> => {
  try {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && MODULE_EXTENSIONS.has(path.extname(entry.name)) && !entry.name.startsWith('_'))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
    throw error;
  }
};

/**
 * Imports every `.js`/`.mjs` file in `directory` (files starting with `_` are skipped)
 * and collects the tool definitions each one exports as `tools` or as a default array.
 * A failing file or definition becomes a diagnostic; the rest of the scan continues.
 */
export async function scanUserModules(directory: string): Promise<UserModuleScan> {
  const resolvedDir = path.resolve(directory);
  const diagnostics: RegistryWarning[] = [];
  let files: string[] | undefined;
  try {
    files = await listModuleFiles(resolvedDir);
  } catch (error) {
    diagnostics.push({ kind: 'load_failure', source: resolvedDir, message: `cannot read tool directory: ${errorMessage(error)}` });
    return { modules: [], diagnostics };
  }
  if (files === undefined) return { modules: [], diagnostics };

  const modules: UserToolModule[] = [];
  // eslint-disable-next-line functional/no-loop-statements -- sequential import keeps diagnostics in file order
  for (const name of files) {
    const file = path.join(resolvedDir, name);
    let record: unknown;
    let revision: string;
    try {
      const stat = await fs.stat(file);
      revision = `${String(Math.trunc(stat.mtimeMs))}:${String(stat.size)}`;
      // The query string defeats the ESM cache so edited files are picked up on reload.
      record = await import(`${pathToFileURL(file).href}?rev=${encodeURIComponent(revision)}`);
    } catch (error) {
      diagnostics.push({ kind: 'load_failure', source: file, message: `failed to import: ${errorMessage(error)}` });
      continue;
    }
    const candidates = exportedCandidates(record);
    if (candidates === undefined) {
      diagnostics.push({ kind: 'invalid_definition', source: file, message: 'module exports no `tools` array or default array' });
      continue;
    }
    const definitions: ToolDefinition[] = [];
    candidates.forEach((candidate, index) => {
      const parsed = definitionSchema.safeParse(candidate);
      if (!parsed.success) {
        diagnostics.push({ kind: 'invalid_definition', source: file, message: `tool ${labelOf(candidate, index)} skipped: ${describeIssues(parsed.error)}` });
        return;
      }
      definitions.push(parsed.data);
    });
    modules.push({ file, revision, definitions });
  }
  return { modules, diagnostics };
}
