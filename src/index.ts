import "reflect-metadata";

export { DependencyContainer, type DependencyContainerOptions } from "./container/dependencyContainer";
export { CyclicDependencyError, DependencyResolutionError, UnresolvableParameterError } from "./container/errors";
export {
  describeClass,
  Injectable,
  parametersOf,
  type ClassRef,
  type ParameterEntry,
} from "./container/typeIntrospector";
