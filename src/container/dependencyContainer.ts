import type { Logger } from "pino";
import { componentLogger } from "../shared/logger";
import { CyclicDependencyError, UnresolvableParameterError } from "./errors";
import { describeClass, parametersOf, type ClassRef } from "./typeIntrospector";

export interface DependencyContainerOptions {
  logger?: Logger;
}

/**
 * Builds classes and their constructor dependencies on demand, keeping one
 * instance per class for the lifetime of the container.
 *
 * `set()` replaces the instance for a class before or after it was built, and
 * every class resolved afterwards receives the replacement. This is also the
 * only way to obtain a class whose constructor takes a primitive.
 */
export class DependencyContainer {
  private readonly registry = new Map<ClassRef, unknown>();

  // Classes whose construction is in progress, outermost first.
  private readonly resolving: ClassRef[] = [];

  private readonly logger: Logger;

  constructor(options: DependencyContainerOptions = {}) {
    this.logger = options.logger ?? componentLogger("dependency-container");
  }

  /**
   * @throws UnresolvableParameterError when a constructor parameter of `classRef`
   * or of one of its dependencies is not an injectable class
   * @throws CyclicDependencyError when `classRef` depends on itself
   */
  get<T>(classRef: ClassRef<T>): T {
    if (this.registry.has(classRef)) {
      return this.registry.get(classRef) as T;
    }

    if (this.resolving.includes(classRef)) {
      throw new CyclicDependencyError(classRef, [...this.resolving, classRef].map(describeClass));
    }

    this.resolving.push(classRef);
    try {
      const instance = this.build(classRef);
      this.registry.set(classRef, instance);
      return instance;
    } finally {
      this.resolving.pop();
    }
  }

  set<T>(classRef: ClassRef<T>, instance: T): void {
    this.registry.set(classRef, instance);
  }

  has(classRef: ClassRef): boolean {
    return this.registry.has(classRef);
  }

  private build<T>(classRef: ClassRef<T>): T {
    const args = parametersOf(classRef).map((parameter, index) => {
      if (parameter.kind === "unresolvable") {
        throw new UnresolvableParameterError(classRef, index, parameter.typeName);
      }
      return this.get(parameter.classRef);
    });

    const instance: T = Reflect.construct(classRef, args);
    this.logger.debug({
      msg: "Constructed dependency",
      className: describeClass(classRef),
      parameterCount: args.length,
    });
    return instance;
  }
}
