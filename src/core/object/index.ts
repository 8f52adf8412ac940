// src/core/object/index.ts

export type { Member, Members, Method, ObjectErrorCode } from "./types";
export { CLASS, ObjectSystemError, isMethod } from "./types";

export type { ClassOptions } from "./class";
export { ClassDef, Instance, InstanceBase, makeClass, classOf, isClass } from "./class";
