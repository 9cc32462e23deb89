import Ajv from 'ajv';

import type { ParameterType, ToolParameter } from './types.js';
import type { JsonSchema } from '../types.js';
import type { Ajv as AjvClass, ErrorObject, Options as AjvOptions, ValidateFunction } from 'ajv';

import { errorMessage } from '../errors.js';
import { isPlainObject, warn } from '../utils.js';
import { fingerprintOf } from '../utils/hash.js';

type AjvInstance = AjvClass;
type AjvErrorObject = ErrorObject<string, Record<string, unknown>>;
type AjvConstructor = new (options?: AjvOptions) => AjvInstance;
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;

const PARAMETER_TYPES: readonly ParameterType[] = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'any'];

const isParameterType = (value: unknown): value is ParameterType =>
  typeof value === 'string' && PARAMETER_TYPES.some((type) => type === value);

export function parametersToSchema(parameters: readonly ToolParameter[]): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  parameters.forEach((param) => {
    const property: JsonSchema = {};
    if (param.type !== 'any') property.type = param.type;
    if (param.description !== undefined) property.description = param.description;
    properties[param.name] = property;
  });
  const required = parameters.filter((param) => param.required).map((param) => param.name);
  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

const propertyType = (property: unknown): ParameterType => {
  if (!isPlainObject(property)) return 'any';
  const declared = property.type;
  if (isParameterType(declared)) return declared;
  if (Array.isArray(declared)) {
    const first = declared.find((entry) => entry !== 'null');
    if (isParameterType(first)) return first;
  }
  return 'any';
};

/** Flattens the top level of an object schema into the registry's ordered parameter list. */
export function schemaToParameters(schema: JsonSchema): ToolParameter[] {
  const properties = isPlainObject(schema.properties) ? schema.properties : {};
  const required = new Set(
    Array.isArray(schema.required) ? schema.required.filter((name): name is string => typeof name === 'string') : []
  );
  return Object.entries(properties).map(([name, property]) => {
    const description = isPlainObject(property) && typeof property.description === 'string' ? property.description : undefined;
    return {
      name,
      type: propertyType(property),
      required: required.has(name),
      ...(description !== undefined ? { description } : {}),
    };
  });
}

export type ValidationOutcome = { ok: true } | { ok: false; errors: string };

const formatErrors = (errors: readonly AjvErrorObject[]): string => errors
  .map((error) => {
    const where = error.instancePath.length > 0 ? error.instancePath : '(root)';
    return `${where} ${error.message ?? 'is invalid'}`;
  })
  .join('; ');

/** Compiles each distinct input schema once and checks call arguments against it. */
export class ArgumentValidator {
  private readonly ajv: AjvInstance = new AjvCtor({ allErrors: true, strict: false });
  // `null` records a schema ajv could not compile; such tools are passed through unchecked.
  private readonly compiled = new Map<string, ValidateFunction | null>();

  validate(schema: JsonSchema, args: Record<string, unknown>): ValidationOutcome {
    const validate = this.compile(schema);
    if (validate === null) return { ok: true };
    if (validate(args)) return { ok: true };
    const errors: AjvErrorObject[] = validate.errors ?? [];
    return { ok: false, errors: formatErrors(errors) };
  }

  private compile(schema: JsonSchema): ValidateFunction | null {
    const key = fingerprintOf(schema);
    const cached = this.compiled.get(key);
    if (cached !== undefined) return cached;
    let validate: ValidateFunction | null;
    try {
      validate = this.ajv.compile(schema);
    } catch (error) {
      warn(`input schema could not be compiled, arguments will not be checked: ${errorMessage(error)}`);
      validate = null;
    }
    this.compiled.set(key, validate);
    return validate;
  }
}
