/**
 * @fileoverview SuperJsonSerializer - Default Payload Serializer
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/serialization
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE (Adapter)
 *
 * Adapts `superjson` to the serializer port:
 *
 * ```
 * serialize    -> superjson.stringify    Date, bigint, Map, Set, RegExp,
 * deserialize  -> superjson.parse        Error, URL, undefined and
 *                                        registered classes survive
 * canonicalize -> safe-stable-stringify of superjson's { json, meta.values }
 * ```
 *
 * Class instances keep their prototype only when the class was
 * registered. Anything else that is not plain data is refused, since
 * it would come back as a bare object.
 *
 * @version 1.0.0
 */

import { configure } from 'safe-stable-stringify';
import SuperJSON from 'superjson';

import { FrameworkError } from '../../domain/common';
import { type IPayloadSerializer } from '../../domain/serialization';

export class SerializationError extends FrameworkError {
  /**
   * Property path to the offending value, `$` being the root.
   */
  public readonly path: string;

  constructor(message: string, code: string, path: string) {
    super(`${message} at ${path}`, code);
    this.path = path;
  }
}

export type SerializableClass = Parameters<SuperJSON['registerClass']>[0];

/**
 * Objects superjson encodes itself, besides plain objects and arrays.
 */
const BUILT_IN_TYPES: readonly (abstract new (...args: never[]) => object)[] = [
  Date,
  RegExp,
  Error,
  URL,
  Map,
  Set,
];

const stableStringify = configure({ deterministic: true, circularValue: TypeError });

function isPlainRecord(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === null || prototype === Object.prototype;
}

/**
 * SuperJsonSerializer - IPayloadSerializer over superjson.
 *
 * @example
 * ```typescript
 * const serializer = new SuperJsonSerializer().registerClass(Order);
 *
 * const hit = serializer.deserialize(serializer.serialize(order));
 * hit instanceof Order; // true
 *
 * serializer.canonicalize({ b: 1, a: 2 }) === serializer.canonicalize({ a: 2, b: 1 }); // true
 * ```
 *
 * @throws SerializationError from every method when the value is cyclic
 * or holds an instance of an unregistered class
 */
export class SuperJsonSerializer implements IPayloadSerializer {
  private readonly superjson = new SuperJSON();

  private readonly classes = new Set<unknown>();

  /**
   * Let instances of `type` round-trip with their prototype. The
   * identifier is written into serialized text and defaults to the
   * class name.
   */
  registerClass(type: SerializableClass, identifier: string = type.name): this {
    this.superjson.registerClass(type, { identifier });
    this.classes.add(type);
    return this;
  }

  canonicalize(value: unknown): string {
    this.check(value);
    // Shared references are recorded in meta.referentialEqualities; they
    // are left out so equal structures give equal text
    const { json, meta } = this.superjson.serialize(value);
    return stableStringify({ json, values: meta?.values });
  }

  serialize(value: unknown): string {
    this.check(value);
    return this.superjson.stringify(value);
  }

  deserialize(text: string): unknown {
    return this.superjson.parse(text);
  }

  private check(value: unknown, path = '$', ancestors: object[] = []): void {
    if (typeof value !== 'object' || value === null) {
      return;
    }

    if (ancestors.includes(value)) {
      throw new SerializationError('Cannot serialize a cyclic structure', 'CYCLIC_VALUE', path);
    }
    const inside = [...ancestors, value];

    if (Array.isArray(value)) {
      value.forEach((item: unknown, index) => this.check(item, `${path}[${index}]`, inside));
      return;
    }

    if (value instanceof Map) {
      for (const [key, entry] of value) {
        this.check(key, `${path}.<key>`, inside);
        this.check(entry, `${path}.get(${String(key)})`, inside);
      }
      return;
    }

    if (value instanceof Set) {
      for (const member of value) {
        this.check(member, `${path}.<member>`, inside);
      }
      return;
    }

    if (BUILT_IN_TYPES.some((type) => value instanceof type)) {
      return;
    }

    if (!isPlainRecord(value) && !this.classes.has(value.constructor)) {
      throw new SerializationError(
        `Cannot serialize an instance of unregistered class '${value.constructor.name}'`,
        'UNREGISTERED_CLASS',
        path,
      );
    }

    for (const [key, entry] of Object.entries(value)) {
      this.check(entry, `${path}.${key}`, inside);
    }
  }
}
