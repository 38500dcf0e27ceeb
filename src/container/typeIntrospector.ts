import "reflect-metadata";

export type ClassRef<T = unknown> = new (...args: never[]) => T;

export type ParameterEntry =
  | { readonly kind: "class"; readonly classRef: ClassRef }
  | { readonly kind: "unresolvable"; readonly typeName: string };

const PARAM_TYPES_KEY = "autowire:paramtypes";
const DESIGN_PARAM_TYPES_KEY = "design:paramtypes";

// Emitted for primitives, interfaces, unions and arrays; none of them can be built with `new` and no arguments.
const NON_INJECTABLE = new Set<unknown>([String, Number, Boolean, Symbol, BigInt, Object, Array, Function, Promise]);

const UNKNOWN_TYPE: ParameterEntry = { kind: "unresolvable", typeName: "unknown" };

function isClassRef(value: unknown): value is ClassRef {
  return typeof value === "function" && value.prototype !== undefined;
}

function toEntry(type: unknown): ParameterEntry {
  if (!isClassRef(type)) return UNKNOWN_TYPE;
  if (NON_INJECTABLE.has(type)) return { kind: "unresolvable", typeName: type.name };
  return { kind: "class", classRef: type };
}

function readDeclaredTypes(classRef: ClassRef): unknown {
  const own: unknown =
    Reflect.getOwnMetadata(PARAM_TYPES_KEY, classRef) ?? Reflect.getOwnMetadata(DESIGN_PARAM_TYPES_KEY, classRef);
  if (own !== undefined) return own;
  // Only an implicit derived constructor forwards its arguments to the base class unchanged.
  if (classRef.length > 0) return undefined;
  return Reflect.getMetadata(PARAM_TYPES_KEY, classRef) ?? Reflect.getMetadata(DESIGN_PARAM_TYPES_KEY, classRef);
}

/**
 * Marks a class for automatic construction.
 *
 * Without arguments it only makes the compiler emit `design:paramtypes` for the
 * class (requires `emitDecoratorMetadata`). With arguments the given types are
 * recorded as the constructor's parameter table and take precedence over
 * anything the compiler emitted.
 *
 * @example
 * ```ts
 * @Injectable(Database, Clock)
 * class ReportService {
 *   constructor(private readonly db: Database, private readonly clock: Clock) {}
 * }
 * ```
 */
export function Injectable(...parameterTypes: ClassRef[]): ClassDecorator {
  return (target) => {
    if (parameterTypes.length > 0) {
      Reflect.defineMetadata(PARAM_TYPES_KEY, parameterTypes, target);
    }
  };
}

/**
 * Ordered constructor parameter entries for `classRef`.
 *
 * A class that carries no type information at all reports one `unknown` entry
 * per declared parameter, so a zero-argument constructor yields `[]`.
 */
export function parametersOf(classRef: ClassRef): ParameterEntry[] {
  const declared = readDeclaredTypes(classRef);
  if (Array.isArray(declared)) {
    return declared.map((type: unknown) => toEntry(type));
  }
  return Array.from({ length: classRef.length }, () => UNKNOWN_TYPE);
}

export function describeClass(classRef: ClassRef): string {
  return classRef.name || "<anonymous class>";
}
