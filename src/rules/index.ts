/**
 * Rules — Barrel export
 */

export { Rule, schemaContext, toViolation } from './rule';
export {
  SchemaAddedRule,
  SchemaRemovedRule,
  SchemaUnresolvedRule,
  TypeChangedRule,
  PropertyAddedRule,
  PropertyRemovedRule,
  RequiredPropertyAddedRule,
  RequiredPropertyRemovedRule,
  ArrayItemsChangedRule,
  EnumValuesAddedRule,
  EnumValuesRemovedRule,
  FormatChangedRule,
  NullableChangedRule,
  DescriptionChangedRule,
} from './schema';
