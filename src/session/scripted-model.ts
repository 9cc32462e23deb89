import fs from 'node:fs';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { ModelAction, ModelClient, ModelRequest } from './model-client.js';

import { ConfigError } from '../errors.js';

const ScriptToolCallSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).default({}),
});

const ScriptStepSchema = z.object({
  chunks: z.array(z.string()).optional(),
  text: z.string().optional(),
  toolCalls: z.array(ScriptToolCallSchema).min(1).optional(),
  final: z.string().optional(),
}).refine((step) => (step.toolCalls === undefined) !== (step.final === undefined), {
  message: 'each step needs exactly one of `toolCalls` or `final`',
});

const ModelScriptSchema = z.object({
  // Replay the last step forever instead of failing once the script runs out.
  repeatLast: z.boolean().default(false),
  steps: z.array(ScriptStepSchema).min(1),
});

export type ModelScript = z.infer<typeof ModelScriptSchema>;
export type ModelScriptInput = z.input<typeof ModelScriptSchema>;

const describeIssues = (error: z.ZodError): string => error.issues
  .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
  .join('; ');

export function parseModelScript(raw: unknown, source = 'model script'): ModelScript {
  const parsed = ModelScriptSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadModelScript(filePath: string): ModelScript {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read model script '${filePath}': ${error instanceof Error ? error.message : String(error)}`);
  }
  let raw: unknown;
  try {
    raw = /\.(ya?ml)$/i.test(filePath) ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`cannot parse model script '${filePath}': ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseModelScript(raw, `model script '${filePath}'`);
}

/**
 * Deterministic model stand-in that replays a fixed list of actions, one per step.
 * Used by the CLI `run` command and by tests.
 */
export class ScriptedModelClient implements ModelClient {
  private cursor = 0;
  private readonly script: ModelScript;

  constructor(script: ModelScript | ModelScriptInput) {
    this.script = parseModelScript(script);
  }

  get callCount(): number {
    return this.cursor;
  }

  async nextAction(_request: ModelRequest): Promise<ModelAction> {
    const { steps, repeatLast } = this.script;
    if (this.cursor >= steps.length && !repeatLast) {
      throw new Error(`model script exhausted after ${String(steps.length)} steps`);
    }
    const step = steps[Math.min(this.cursor, steps.length - 1)];
    this.cursor += 1;
    const shared = {
      ...(step.chunks !== undefined ? { chunks: [...step.chunks] } : {}),
    };
    if (step.toolCalls !== undefined) {
      return {
        kind: 'tool_calls',
        calls: step.toolCalls.map((call) => ({ ...call, arguments: { ...call.arguments } })),
        ...(step.text !== undefined ? { text: step.text } : {}),
        ...shared,
      };
    }
    return { kind: 'final', text: step.final ?? step.text ?? '', ...shared };
  }
}
