/**
 * Schema Rules
 *
 * One class per kind of schema difference. Severity is fixed per class,
 * except for NullableChangedRule where it depends on the direction.
 */

import { JsonValue, RuleCategory, SchemaType, Severity } from '../core/types';
import { typeLabel } from '../core/schema';
import { Rule, schemaContext } from './rule';

abstract class SchemaRule implements Rule {
  abstract readonly name: string;
  readonly category: RuleCategory = 'schema';

  constructor(
    readonly schema: string,
    readonly path: string = ''
  ) {}

  abstract description(): string;

  abstract severity(): Severity;

  context(): string {
    return schemaContext(this.schema, this.path);
  }
}

/** Last segment of a property path ('address.city' → 'city') */
function propertyName(path: string): string {
  return path.slice(path.lastIndexOf('.') + 1);
}

function listValues(values: readonly JsonValue[]): string {
  return values.map((v) => JSON.stringify(v)).join(', ');
}

function orNone(value: string | undefined): string {
  return value ?? '(none)';
}

// ─── Schema Presence ────────────────────────────────────────────────────────

export class SchemaAddedRule extends SchemaRule {
  readonly name = 'SchemaAdded';

  description(): string {
    return `Schema '${this.schema}' was added`;
  }

  severity(): Severity {
    return 'change';
  }
}

export class SchemaRemovedRule extends SchemaRule {
  readonly name = 'SchemaRemoved';

  description(): string {
    return `Schema '${this.schema}' was removed`;
  }

  severity(): Severity {
    return 'breaking';
  }
}

/** A reference that does not resolve inside its own document */
export class SchemaUnresolvedRule extends SchemaRule {
  readonly name = 'SchemaUnresolved';

  constructor(
    schema: string,
    path: string,
    readonly pointer: string
  ) {
    super(schema, path);
  }

  description(): string {
    return `Reference '${this.pointer}' could not be resolved`;
  }

  severity(): Severity {
    return 'change';
  }
}

// ─── Type ───────────────────────────────────────────────────────────────────

export class TypeChangedRule extends SchemaRule {
  readonly name = 'TypeChanged';

  constructor(
    schema: string,
    path: string,
    readonly before: readonly SchemaType[],
    readonly after: readonly SchemaType[]
  ) {
    super(schema, path);
  }

  description(): string {
    return `Type changed from '${typeLabel(this.before)}' to '${typeLabel(this.after)}'`;
  }

  severity(): Severity {
    return 'breaking';
  }
}

// ─── Properties ─────────────────────────────────────────────────────────────

export class PropertyAddedRule extends SchemaRule {
  readonly name = 'PropertyAdded';

  description(): string {
    return `Property '${propertyName(this.path)}' was added`;
  }

  severity(): Severity {
    return 'change';
  }
}

export class PropertyRemovedRule extends SchemaRule {
  readonly name = 'PropertyRemoved';

  description(): string {
    return `Property '${propertyName(this.path)}' was removed`;
  }

  severity(): Severity {
    return 'breaking';
  }
}

/**
 * A property became mandatory, either as a new property or as an existing
 * one joining the required list.
 */
export class RequiredPropertyAddedRule extends SchemaRule {
  readonly name = 'RequiredPropertyAdded';

  description(): string {
    return `Required property '${propertyName(this.path)}' was added`;
  }

  severity(): Severity {
    return 'breaking';
  }
}

/** The property still exists but left the required list */
export class RequiredPropertyRemovedRule extends SchemaRule {
  readonly name = 'RequiredPropertyRemoved';

  description(): string {
    return `Property '${propertyName(this.path)}' is no longer required`;
  }

  severity(): Severity {
    return 'change';
  }
}

export class ArrayItemsChangedRule extends SchemaRule {
  readonly name = 'ArrayItemsChanged';

  constructor(
    schema: string,
    path: string,
    readonly change: 'added' | 'removed'
  ) {
    super(schema, path);
  }

  description(): string {
    return `Array items schema was ${this.change}`;
  }

  severity(): Severity {
    return 'warning';
  }
}

// ─── Constraints ────────────────────────────────────────────────────────────

export class EnumValuesAddedRule extends SchemaRule {
  readonly name = 'EnumValuesAdded';

  constructor(
    schema: string,
    path: string,
    readonly values: readonly JsonValue[]
  ) {
    super(schema, path);
  }

  description(): string {
    return `Enum values added: [${listValues(this.values)}]`;
  }

  severity(): Severity {
    return 'change';
  }
}

export class EnumValuesRemovedRule extends SchemaRule {
  readonly name = 'EnumValuesRemoved';

  constructor(
    schema: string,
    path: string,
    readonly values: readonly JsonValue[]
  ) {
    super(schema, path);
  }

  description(): string {
    return `Enum values removed: [${listValues(this.values)}]`;
  }

  severity(): Severity {
    return 'breaking';
  }
}

export class FormatChangedRule extends SchemaRule {
  readonly name = 'FormatChanged';

  constructor(
    schema: string,
    path: string,
    readonly before: string | undefined,
    readonly after: string | undefined
  ) {
    super(schema, path);
  }

  description(): string {
    return `Format changed from '${orNone(this.before)}' to '${orNone(this.after)}'`;
  }

  severity(): Severity {
    return 'warning';
  }
}

/**
 * nullable → non-nullable is breaking; non-nullable → nullable is a warning.
 */
export class NullableChangedRule extends SchemaRule {
  readonly name = 'NullableChanged';

  constructor(
    schema: string,
    path: string,
    readonly before: boolean,
    readonly after: boolean
  ) {
    super(schema, path);
  }

  description(): string {
    return `Nullable changed from ${this.before} to ${this.after}`;
  }

  severity(): Severity {
    return this.before && !this.after ? 'breaking' : 'warning';
  }
}

export class DescriptionChangedRule extends SchemaRule {
  readonly name = 'DescriptionChanged';

  constructor(
    schema: string,
    path: string,
    readonly before: string | undefined,
    readonly after: string | undefined
  ) {
    super(schema, path);
  }

  description(): string {
    return `Description changed from '${orNone(this.before)}' to '${orNone(this.after)}'`;
  }

  severity(): Severity {
    return 'change';
  }
}
