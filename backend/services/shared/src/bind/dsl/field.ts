// backend/services/shared/src/bind/dsl/field.ts
/**
 * Purpose:
 * - Builders for flat-shape field descriptors.
 *
 * Usage:
 *   const params = {
 *     id: field.int(),
 *     postId: field.int({ name: "post_id" }),
 *     tags: field.array(field.string()),
 *   };
 */

import type {
  ArrayField,
  FieldDescriptor,
  FieldOpts,
  FieldsShape,
  MapField,
  ObjectField,
  ScalarField,
  ScalarKind,
} from "./types";

function scalar<K extends ScalarKind>(kind: K) {
  return (opts: FieldOpts = {}): ScalarField<K> => ({ ...opts, kind });
}

export const field = {
  boolean: scalar("boolean"),
  string: scalar("string"),

  int: scalar("int"),
  int8: scalar("int8"),
  int16: scalar("int16"),
  int32: scalar("int32"),
  int64: scalar("int64"),

  uint: scalar("uint"),
  uint8: scalar("uint8"),
  uint16: scalar("uint16"),
  uint32: scalar("uint32"),
  uint64: scalar("uint64"),

  float32: scalar("float32"),
  float64: scalar("float64"),

  array<E extends FieldDescriptor>(of: E, opts: FieldOpts = {}): ArrayField<E> {
    return { ...opts, kind: "array", of };
  },

  /** Records are describable but never bindable from path/query values. */
  object<S extends FieldsShape>(shape: S, opts: FieldOpts = {}): ObjectField<S> {
    return { ...opts, kind: "object", shape };
  },

  map<E extends FieldDescriptor>(of: E, opts: FieldOpts = {}): MapField<E> {
    return { ...opts, kind: "map", of };
  },
};
