export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    return value;
  }
}

class UnknownNode implements JotSchema<unknown> {
  parse(value: unknown): unknown {
    return value;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

/**
 * Accepts `undefined` and `null` as "absent" and substitutes the fallback; any other
 * value must satisfy the inner node.
 */
class DefaultNode<T> implements JotSchema<T> {
  constructor(readonly inner: JotSchema<T>, readonly fallback: T) {}

  parse(value: unknown, path: string = 'value'): T {
    if (value === undefined || value === null) {
      return this.fallback;
    }

    return this.inner.parse(value, path);
  }
}

class ObjectNode<Shape extends Record<string, JotSchema<unknown>>> implements JotSchema<{ [K in keyof Shape]: InferJot<Shape[K]> }> {
  constructor(readonly shape: Shape) {}

  parse(value: unknown, path: string = 'value'): { [K in keyof Shape]: InferJot<Shape[K]> } {
    if (!isPlainObject(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as { [K in keyof Shape]: InferJot<Shape[K]> };
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const jot = {
  string: (): JotSchema<string> => new StringNode(),
  unknown: (): JotSchema<unknown> => new UnknownNode(),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  withDefault: <T>(schema: JotSchema<T>, fallback: T): JotSchema<T> => new DefaultNode(schema, fallback),
  object: <Shape extends Record<string, JotSchema<unknown>>>(shape: Shape) => new ObjectNode(shape),
};
