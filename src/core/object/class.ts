// src/core/object/class.ts
// Single-parent classes with copy-down members, instances, membership tests

import {
  CLASS,
  ObjectSystemError,
  isMethod,
  notAClass,
  type Member,
  type Members,
} from "./types";

export type ClassOptions = {
  /** Display name, used in diagnostics */
  name?: string;
  /** Superclass; its members are copied into the new class unless redefined */
  parent?: ClassDef;
  /** Members defined by the new class itself */
  members?: Members;
};

let anonymousCounter = 0;

/**
 * ClassDef: a named member table with an optional superclass.
 *
 * The member set is fixed at creation. Inherited members are copied down
 * from the parent, so `lookup` normally answers from the class's own table;
 * the superclass chain is still consulted for names the copy did not cover.
 */
export class ClassDef {
  readonly name: string;
  readonly superclass: ClassDef | undefined;
  private readonly members: ReadonlyMap<string, Member>;

  constructor(options: ClassOptions = {}) {
    const { parent } = options;
    if (parent !== undefined && !(parent instanceof ClassDef)) {
      throw notAClass("O0101", parent);
    }

    const members = new Map<string, Member>(Object.entries(options.members ?? {}));
    if (parent) {
      for (const [key, value] of parent.entries()) {
        if (!members.has(key)) {
          members.set(key, value);
        }
      }
    }

    this.name = options.name ?? `Class${anonymousCounter++}`;
    this.superclass = parent;
    this.members = members;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  lookup(name: string): Member | undefined {
    let cls: ClassDef | undefined = this;
    while (cls) {
      if (cls.members.has(name)) {
        return cls.members.get(name);
      }
      cls = cls.superclass;
    }
    return undefined;
  }

  entries(): Iterable<[string, Member]> {
    return this.members.entries();
  }

  /** This class followed by its superclasses, nearest first. */
  ancestors(): ClassDef[] {
    const chain: ClassDef[] = [];
    let cls: ClassDef | undefined = this;
    while (cls) {
      chain.push(cls);
      cls = cls.superclass;
    }
    return chain;
  }

  isSubclassOf(other: ClassDef): boolean {
    return this.ancestors().includes(other);
  }

  /**
   * Create a new instance and run the `init` member, if any, with
   * `(instance, ...args)`.
   */
  instantiate(...args: unknown[]): Instance {
    return new Instance(this, args);
  }

  /**
   * Probe an arbitrary value: is it an instance of this class or a subclass?
   */
  classOf(value: unknown): value is InstanceBase {
    return value instanceof InstanceBase && value.instanceOf(this);
  }
}

/**
 * InstanceBase: class identity and construction. Per-instance state lives in
 * `slots`, which only subclasses can reach.
 */
export class InstanceBase {
  readonly [CLASS]: ClassDef;
  protected readonly slots = new Map<string, unknown>();

  constructor(klass: ClassDef, args: readonly unknown[] = []) {
    if (!(klass instanceof ClassDef)) {
      throw notAClass("O0100", klass);
    }
    this[CLASS] = klass;

    const init = klass.lookup("init");
    if (isMethod(init)) {
      init(this, ...args);
    }
  }

  get klass(): ClassDef {
    return this[CLASS];
  }

  /** Walks this instance's class chain comparing identity. */
  instanceOf(cls: ClassDef): boolean {
    if (!(cls instanceof ClassDef)) {
      throw notAClass("O0100", cls);
    }
    return this[CLASS].isSubclassOf(cls);
  }
}

/**
 * Instance: an object bound to exactly one class, with its own slots.
 */
export class Instance extends InstanceBase {
  /** Slot value if set, otherwise the class member of that name. */
  get(name: string): unknown {
    if (this.slots.has(name)) {
      return this.slots.get(name);
    }
    return this[CLASS].lookup(name);
  }

  set(name: string, value: unknown): void {
    this.slots.set(name, value);
  }

  hasSlot(name: string): boolean {
    return this.slots.has(name);
  }

  /** Call a function member with this instance as the first argument. */
  send(name: string, ...args: unknown[]): unknown {
    const member = this.get(name);
    if (!isMethod(member)) {
      throw new ObjectSystemError("O0102", { class: this[CLASS].name, member: name });
    }
    return member(this, ...args);
  }
}

export function makeClass(options: ClassOptions = {}): ClassDef {
  return new ClassDef(options);
}

/**
 * `candidate.classOf(value)` when `candidate` is a class; false for any other candidate.
 */
export function classOf(candidate: unknown, value: unknown): boolean {
  if (!(candidate instanceof ClassDef)) {
    return false;
  }
  return candidate.classOf(value);
}

export function isClass(value: unknown): value is ClassDef {
  return value instanceof ClassDef;
}
