import { Ajv, type JSONSchemaType } from 'ajv';
import { readEnvInt } from './util/env.js';

export interface RunConfig {
  stackLimit?: number;
  maxSteps?: number;
  strict?: boolean;
}

export interface ResolvedRunConfig {
  stackLimit: number;
  maxSteps: number | undefined;
  strict: boolean;
}

export const DEFAULT_STACK_LIMIT = 1024;

export const runConfigSchema: JSONSchemaType<RunConfig> = {
  type: 'object',
  additionalProperties: false,
  required: [],
  properties: {
    stackLimit: { type: 'integer', minimum: 1, nullable: true },
    maxSteps: { type: 'integer', minimum: 1, nullable: true },
    strict: { type: 'boolean', nullable: true },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRunConfig = ajv.compile(runConfigSchema);

export function parseRunConfig(value: unknown): RunConfig {
  if (!validateRunConfig(value)) {
    throw new Error(`E_CONFIG ${ajv.errorsText(validateRunConfig.errors)}`);
  }
  return value;
}

/** Later layers win; the environment sits below every explicit layer. */
export function resolveRunConfig(
  layers: readonly RunConfig[],
  env: NodeJS.ProcessEnv = process.env,
): ResolvedRunConfig {
  const resolved: ResolvedRunConfig = {
    stackLimit: readEnvInt('MINIVM_STACK_LIMIT', env) ?? DEFAULT_STACK_LIMIT,
    maxSteps: undefined,
    strict: false,
  };
  for (const layer of layers) {
    // schema-validated layers may carry explicit nulls
    if (layer.stackLimit != null) resolved.stackLimit = layer.stackLimit;
    if (layer.maxSteps != null) resolved.maxSteps = layer.maxSteps;
    if (layer.strict != null) resolved.strict = layer.strict;
  }
  return resolved;
}
