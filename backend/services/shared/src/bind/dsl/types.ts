// backend/services/shared/src/bind/dsl/types.ts
/**
 * Purpose:
 * - Shared types for the Field DSL used to declare a handler's flat input shape.
 * - Descriptors are plain objects (no closures) so they can be inspected,
 *   cached and logged.
 *
 * Invariants:
 * - `kind` is the only discriminant.
 * - `name` is the external-name annotation; when absent the property key is used.
 */

export type IntKind = "int" | "int8" | "int16" | "int32" | "int64";
export type UintKind = "uint" | "uint8" | "uint16" | "uint32" | "uint64";
export type FloatKind = "float32" | "float64";

/** Primitive kinds a flat shape may carry (directly or as array elements). */
export type ScalarKind = "boolean" | "string" | IntKind | UintKind | FloatKind;

export type FieldKind = ScalarKind | "array" | "object" | "map";

export type FieldOpts = {
  /** External name matched against path and query keys. */
  name?: string;
};

export interface ScalarField<K extends ScalarKind = ScalarKind>
  extends FieldOpts {
  kind: K;
}

export interface ArrayField<E extends FieldDescriptor = FieldDescriptor>
  extends FieldOpts {
  kind: "array";
  of: E;
}

export interface ObjectField<S extends FieldsShape = FieldsShape>
  extends FieldOpts {
  kind: "object";
  shape: S;
}

export interface MapField<E extends FieldDescriptor = FieldDescriptor>
  extends FieldOpts {
  kind: "map";
  of: E;
}

export type FieldDescriptor =
  | ScalarField
  | ArrayField
  | ObjectField
  | MapField;

export type FieldsShape = { [key: string]: FieldDescriptor };

/** Run-time value of a primitive kind. */
export type ScalarValue<K extends ScalarKind> = K extends "boolean"
  ? boolean
  : K extends "string"
  ? string
  : K extends "int64" | "uint64"
  ? bigint
  : number;

export type InferField<D extends FieldDescriptor> =
  D extends ArrayField<infer E extends FieldDescriptor>
    ? InferField<E>[]
    : D extends ObjectField<infer S extends FieldsShape>
    ? InferFields<S>
    : D extends MapField<infer E extends FieldDescriptor>
    ? Record<string, InferField<E>>
    : D extends ScalarField<infer K extends ScalarKind>
    ? ScalarValue<K>
    : never;

export type InferFields<S extends FieldsShape> = {
  [P in keyof S]: InferField<S[P]>;
};
