/**
 * Generic data tree used to introspect and round-trip entities without
 * referencing host types. Mappings keep insertion order (all keys are
 * non-numeric strings), sequences keep element order.
 */

export type DataScalar = string | number | boolean | null;

export type DataValue = DataScalar | DataValue[] | DataTree;

export interface DataTree {
  [key: string]: DataValue;
}
