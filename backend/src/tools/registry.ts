import type { z } from 'zod';
import type { ToolArguments, ToolDefinition } from '../../../shared/types.js';
import {
  ErrorCode,
  InvalidArgumentsError,
  RegistryError,
  ToolExecutionError,
  UnknownToolError,
  isAgentError
} from '../utils/errors.js';

/**
 * Argument schemas are strict zod objects: unknown parameter names are rejected
 * at dispatch instead of being silently dropped.
 */
export type ToolArgsSchema<TShape extends z.ZodRawShape> = z.ZodObject<TShape, 'strict'>;

export interface ToolRegistration<TName extends string, TOwner, TShape extends z.ZodRawShape> {
  definition: ToolDefinition & { name: TName };
  schema: ToolArgsSchema<TShape>;
  owner: TOwner;
  operation: (owner: TOwner, args: z.output<ToolArgsSchema<TShape>>) => unknown;
}

interface RegistryEntry {
  definition: ToolDefinition;
  invoke: (args: ToolArguments) => Promise<unknown>;
}

function assertSchemaMatches<TShape extends z.ZodRawShape>(
  definition: ToolDefinition,
  schema: ToolArgsSchema<TShape>
) {
  const declared = Object.keys(definition.parameters).sort();
  const accepted = Object.keys(schema.shape).sort();

  const missing = accepted.filter((name) => !declared.includes(name));
  const extra = declared.filter((name) => !accepted.includes(name));
  if (missing.length || extra.length) {
    throw new RegistryError(
      ErrorCode.SCHEMA_MISMATCH,
      `Tool ${definition.name} declares [${declared.join(', ')}] but its operation accepts [${accepted.join(', ')}]`
    );
  }

  for (const name of accepted) {
    const required = !schema.shape[name].isOptional();
    if (definition.parameters[name].required !== required) {
      throw new RegistryError(
        ErrorCode.SCHEMA_MISMATCH,
        `Tool ${definition.name} parameter "${name}" is declared ${
          definition.parameters[name].required ? 'required' : 'optional'
        } but the operation treats it as ${required ? 'required' : 'optional'}`
      );
    }
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    if (issue.code === 'unrecognized_keys') {
      return `unexpected parameter(s): ${issue.keys.join(', ')}`;
    }
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Maps tool names chosen by the model to typed operations.
 * Built once when an agent is constructed and read-only afterwards.
 */
export class CapabilityRegistry<TName extends string = string> {
  private readonly entries = new Map<string, RegistryEntry>();

  register<TOwner, TShape extends z.ZodRawShape>(registration: ToolRegistration<TName, TOwner, TShape>): this {
    const { definition, schema, owner, operation } = registration;

    if (this.entries.has(definition.name)) {
      throw new RegistryError(ErrorCode.DUPLICATE_TOOL, `Tool "${definition.name}" is already registered`);
    }
    assertSchemaMatches(definition, schema);

    const frozen: ToolDefinition = Object.freeze({
      name: definition.name,
      description: definition.description,
      parameters: Object.freeze({ ...definition.parameters })
    });

    this.entries.set(definition.name, {
      definition: frozen,
      invoke: async (args) => {
        const parsed = schema.safeParse(args);
        if (!parsed.success) {
          throw new InvalidArgumentsError(definition.name, formatIssues(parsed.error));
        }

        try {
          return await operation(owner, parsed.data);
        } catch (error) {
          if (isAgentError(error)) {
            throw error;
          }
          throw new ToolExecutionError(definition.name, error);
        }
      }
    });

    return this;
  }

  has(name: string): name is TName {
    return this.entries.has(name);
  }

  async dispatch(name: string, args: ToolArguments): Promise<unknown> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UnknownToolError(name);
    }
    return entry.invoke(args);
  }

  listDefinitions(): ToolDefinition[] {
    return Array.from(this.entries.values(), (entry) => entry.definition);
  }

  get size(): number {
    return this.entries.size;
  }
}
