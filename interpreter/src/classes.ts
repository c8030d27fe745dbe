/**
 * Class registry: class names to their method tables and field
 * initializers. Filled once when a program loads.
 */

import { ClassDeclaration, FieldDeclaration } from './ast';
import {
  TinyClass,
  TinyValue,
  FunctionValue,
  InstanceValue,
  mkFunction,
  mkInstance,
} from './values';
import { RedefinitionError, UnboundNameError } from './errors';

export class ClassRegistry {
  private classes = new Map<string, TinyClass>();

  static fromDeclarations(decls: readonly ClassDeclaration[]): ClassRegistry {
    const registry = new ClassRegistry();
    for (const decl of decls) {
      registry.register(decl);
    }
    return registry;
  }

  /**
   * Build a class from its declaration. Duplicate class, method or field
   * names are a RedefinitionError.
   */
  register(decl: ClassDeclaration): TinyClass {
    if (this.classes.has(decl.name)) {
      throw new RedefinitionError(decl.name, decl.loc);
    }

    const methods = new Map<string, FunctionValue>();
    const fieldNames = new Set<string>();
    for (const field of decl.fields) {
      if (fieldNames.has(field.name)) {
        throw new RedefinitionError(`${decl.name}.${field.name}`, field.loc);
      }
      fieldNames.add(field.name);
    }

    // The method table is filled after the class object exists so that each
    // FunctionValue can point back at its owner.
    const cls: TinyClass = { name: decl.name, methods, fields: [...decl.fields] };
    for (const method of decl.methods) {
      if (methods.has(method.name)) {
        throw new RedefinitionError(`${decl.name}.${method.name}`, method.loc);
      }
      methods.set(method.name, mkFunction(method, cls));
    }

    this.classes.set(decl.name, cls);
    return cls;
  }

  get(name: string): TinyClass {
    const cls = this.classes.get(name);
    if (cls === undefined) {
      throw new UnboundNameError(name);
    }
    return cls;
  }

  all(): TinyClass[] {
    return Array.from(this.classes.values());
  }

  /**
   * Create an instance of the named class, filling its fields in
   * declaration order with the values `initField` produces.
   */
  construct(name: string, initField: (field: FieldDeclaration) => TinyValue): InstanceValue {
    const cls = this.get(name);
    const instance = mkInstance(cls);
    for (const field of cls.fields) {
      instance.fields.set(field.name, initField(field));
    }
    return instance;
  }
}

export function findMethod(cls: TinyClass, name: string): FunctionValue | undefined {
  return cls.methods.get(name);
}
