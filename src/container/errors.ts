import { describeClass, type ClassRef } from "./typeIntrospector";

export class DependencyResolutionError extends Error {
  readonly target: ClassRef;

  constructor(target: ClassRef, message: string) {
    super(message);
    this.name = new.target.name;
    this.target = target;
  }
}

/**
 * A constructor parameter is typed with something the container cannot build:
 * a primitive, an interface or union (emitted as `Object`), or no type at all.
 * The only way past it is registering the whole owning class with `set()`.
 */
export class UnresolvableParameterError extends DependencyResolutionError {
  readonly parameterIndex: number;
  readonly typeName: string;

  constructor(target: ClassRef, parameterIndex: number, typeName: string) {
    const className = describeClass(target);
    super(
      target,
      `Cannot resolve parameter #${parameterIndex} of ${className}: ${typeName} is not an injectable class. ` +
        `Register a ${className} instance with set() instead.`
    );
    this.parameterIndex = parameterIndex;
    this.typeName = typeName;
  }
}

export class CyclicDependencyError extends DependencyResolutionError {
  /** Class names from the outermost `get` down to the repeated class. */
  readonly path: string[];

  constructor(target: ClassRef, path: string[]) {
    super(target, `Circular dependency detected: ${path.join(" -> ")}`);
    this.path = path;
  }
}
