// ============================================
// STRATA - Model Registry
// Explicit registry handed to the migration engine
// ============================================

import type { SchemaOptions, SchemaSnapshot } from './types';
import { Schema } from './Schema';
import type { SchemaDefinition } from './Schema';
import { DeclarationError } from './errors';

export interface ModelDefinition {
  name: string;
  schema: Schema;
  /** Table name after defaults are applied */
  table: string;
  describe(): SchemaSnapshot;
}

/**
 * ModelRegistry
 * Holds the models one migration run works on, in registration order
 */
export class ModelRegistry {
  private models: Map<string, ModelDefinition> = new Map();

  /**
   * Register a model
   *
   * @example
   * ```ts
   * const registry = new ModelRegistry();
   * registry.model('SiteUser', new Schema({ id: 'SERIAL', name: 'varchar(255)' }));
   * ```
   */
  model(name: string, schema: Schema): ModelDefinition {
    if (this.models.has(name)) {
      throw new DeclarationError(`Model '${name}' is already registered`, { model: name });
    }

    const table = schema.options.table ?? name;
    for (const other of this.models.values()) {
      if (other.table === table) {
        throw new DeclarationError(`Models '${other.name}' and '${name}' share table '${table}'`, { model: name });
      }
    }

    const definition: ModelDefinition = {
      name,
      schema,
      table,
      describe: () => schema.describe(name)
    };
    this.models.set(name, definition);
    return definition;
  }

  /**
   * Shorthand for `model(name, new Schema(definition, options))`
   */
  define(name: string, definition: SchemaDefinition, options?: SchemaOptions): ModelDefinition {
    return this.model(name, new Schema(definition, options));
  }

  get(name: string): ModelDefinition | undefined {
    return this.models.get(name);
  }

  require(name: string): ModelDefinition {
    const model = this.models.get(name);
    if (!model) {
      throw new DeclarationError(`Unknown model '${name}'`, { model: name });
    }
    return model;
  }

  all(): ModelDefinition[] {
    return [...this.models.values()];
  }

  /**
   * Selected models in registration order, or all of them
   */
  select(names?: string[]): ModelDefinition[] {
    if (!names || names.length === 0) return this.all();
    const wanted = new Set(names);
    for (const name of wanted) this.require(name);
    return this.all().filter(model => wanted.has(model.name));
  }

  clear(): void {
    this.models.clear();
  }
}
