// ============================================
// STRATA - Schema Class
// Explicit field declarations, described as snapshots
// ============================================

import type {
  FieldDefinition,
  FieldSpec,
  SchemaOptions,
  SchemaSnapshot,
  UniqueGroup
} from './types';
import { DeclarationError } from './errors';
import { indexKind, parseIndexSpec } from './migration/snapshot';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Names starting with this marker are reserved for generated identifiers */
export const RESERVED_PREFIX = '__';

/**
 * Fluent field builder
 *
 * @example
 * ```ts
 * field('varchar(65)').alter("SET DEFAULT 'Guest'", 'SET NOT NULL').index('btree')
 * ```
 */
export class FieldBuilder {
  private definition: FieldDefinition;

  constructor(type: string) {
    this.definition = { type, onAdd: '', alter: [], index: [], unique: false };
  }

  /** DDL fragment used only when the column is first added */
  onAdd(fragment: string): this {
    this.definition.onAdd = fragment;
    return this;
  }

  /** `ALTER COLUMN` fragments */
  alter(...ops: string[]): this {
    this.definition.alter = [...(this.definition.alter ?? []), ...ops];
    return this;
  }

  index(...kinds: string[]): this {
    this.definition.index = [...(this.definition.index ?? []), ...kinds];
    return this;
  }

  unique(): this {
    this.definition.unique = true;
    return this;
  }

  build(): FieldDefinition {
    return {
      ...this.definition,
      alter: [...(this.definition.alter ?? [])],
      index: [...(this.definition.index ?? [])]
    };
  }
}

export function field(type: string): FieldBuilder {
  return new FieldBuilder(type);
}

/** `name: 'varchar(255)'`, `name: { type: ... }` or `name: field(...)` */
export type SchemaField = string | FieldDefinition | FieldBuilder;

export interface SchemaDefinition {
  [key: string]: SchemaField;
}

export class Schema {
  public definition: Map<string, FieldDefinition> = new Map();
  public options: SchemaOptions;
  private groups: Map<string, string[]> = new Map();

  constructor(definition: SchemaDefinition, options: SchemaOptions = {}) {
    this.options = {
      primaryKey: 'id',
      ...options
    };

    for (const [name, value] of Object.entries(definition)) {
      this.add(name, value);
    }
    for (const [groupName, fieldNames] of Object.entries(options.uniqueGroups ?? {})) {
      this.uniqueGroup(groupName, fieldNames);
    }
  }

  /**
   * Short syntax (`name: 'text'`) is normalized to the long form
   */
  private normalize(value: SchemaField): FieldDefinition {
    if (typeof value === 'string') {
      return { type: value };
    }
    if (value instanceof FieldBuilder) {
      return value.build();
    }
    return { ...value };
  }

  /**
   * Register a field; declaration order is kept
   */
  add(name: string, value: SchemaField): this {
    if (this.definition.has(name)) {
      throw new DeclarationError(`Field '${name}' is declared twice`, { field: name });
    }
    this.definition.set(name, this.normalize(value));
    return this;
  }

  /**
   * Register a named composite unique constraint
   */
  uniqueGroup(groupName: string, fieldNames: string[]): this {
    if (this.groups.has(groupName)) {
      throw new DeclarationError(`Unique group '${groupName}' is declared twice`, { group: groupName });
    }
    this.groups.set(groupName, [...fieldNames]);
    return this;
  }

  /**
   * Flatten the declaration into a snapshot.
   * Identity checks happen here; cross references are checked by `validateSnapshot`.
   */
  describe(modelName: string): SchemaSnapshot {
    const table = this.options.table ?? modelName;
    const primaryKey = this.options.primaryKey ?? 'id';

    if (!IDENTIFIER.test(table)) {
      throw new DeclarationError(`Invalid table name '${table}' for model '${modelName}'`, { model: modelName });
    }

    const fields: Record<string, FieldSpec> = {};
    for (const [name, def] of this.definition) {
      fields[name] = this.describeField(modelName, name, def);
    }

    const uniqueGroups: Record<string, UniqueGroup> = {};
    for (const [groupName, fieldNames] of this.groups) {
      if (!IDENTIFIER.test(groupName)) {
        throw new DeclarationError(`Invalid unique group name '${groupName}' in model '${modelName}'`, { model: modelName });
      }
      if (fieldNames.length === 0) {
        throw new DeclarationError(`Unique group '${groupName}' in model '${modelName}' has no fields`, { model: modelName });
      }
      if (new Set(fieldNames).size !== fieldNames.length) {
        throw new DeclarationError(`Unique group '${groupName}' in model '${modelName}' repeats a field`, { model: modelName });
      }
      uniqueGroups[groupName] = { groupName, fieldNames: [...fieldNames] };
    }

    return { table, primaryKey, fields, uniqueGroups };
  }

  private describeField(modelName: string, name: string, def: FieldDefinition): FieldSpec {
    if (!IDENTIFIER.test(name)) {
      throw new DeclarationError(`Invalid field name '${name}' in model '${modelName}'`, { model: modelName, field: name });
    }
    if (name.startsWith(RESERVED_PREFIX)) {
      throw new DeclarationError(
        `Field name '${name}' in model '${modelName}' uses the reserved prefix '${RESERVED_PREFIX}'`,
        { model: modelName, field: name }
      );
    }
    if (!def.type || !def.type.trim()) {
      throw new DeclarationError(`Field '${name}' in model '${modelName}' has no SQL type`, { model: modelName, field: name });
    }

    const indexSpecs = (def.index ?? []).map(parseIndexSpec);
    const seen = new Map<string, boolean>();
    for (const index of indexSpecs) {
      const kind = indexKind(index);
      const previous = seen.get(kind);
      if (previous !== undefined) {
        const reason = previous === index.remove ? 'is declared twice' : 'is both declared and marked for removal';
        throw new DeclarationError(`Index '${kind}' on '${modelName}.${name}' ${reason}`, { model: modelName, field: name });
      }
      seen.set(kind, index.remove);
    }

    return {
      name,
      sqlType: def.type.trim(),
      onAdd: (def.onAdd ?? '').trim(),
      alterOps: (def.alter ?? []).map(op => op.trim()).filter(op => op.length > 0),
      indexSpecs,
      unique: def.unique === true
    };
  }
}
