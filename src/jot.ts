import { DecodeError } from './errors.js';

export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new DecodeError(`${path} must be a string`, path);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new DecodeError(`${path} must be a number`, path);
    }

    return value;
  }
}

class BooleanNode implements JotSchema<boolean> {
  parse(value: unknown, path: string = 'value'): boolean {
    if (typeof value !== 'boolean') {
      throw new DecodeError(`${path} must be a boolean`, path);
    }

    return value;
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    return this.inner.parse(value, path);
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new DecodeError(`${path} must be an array`, path);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class RecordNode<T> implements JotSchema<Record<string, T>> {
  constructor(readonly valueNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): Record<string, T> {
    if (!isPlainObject(value)) {
      throw new DecodeError(`${path} must be an object`, path);
    }

    const result: Record<string, T> = {};
    for (const [key, item] of Object.entries(value)) {
      setOwn(result, key, this.valueNode.parse(item, `${path}[${JSON.stringify(key)}]`));
    }
    return result;
  }
}

type ObjectShape = Record<string, JotSchema<unknown>>;

class ObjectNode<Shape extends ObjectShape> implements JotSchema<{ [K in keyof Shape]: InferJot<Shape[K]> }> {
  constructor(readonly shape: Shape) {}

  parse(value: unknown, path: string = 'value') {
    if (!isPlainObject(value)) {
      throw new DecodeError(`${path} must be an object`, path);
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as { [K in keyof Shape]: InferJot<Shape[K]> };
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (): JotSchema<string> => new StringNode(),
  number: (): JotSchema<number> => new NumberNode(),
  boolean: (): JotSchema<boolean> => new BooleanNode(),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  record: <T>(schema: JotSchema<T>): JotSchema<Record<string, T>> => new RecordNode(schema),
  object: <Shape extends ObjectShape>(shape: Shape) => new ObjectNode(shape),
};

/** Parses `raw` as JSON and validates it, reporting failures as `DecodeError`. */
export function decodeJson<T>(raw: string, schema: JotSchema<T>, label: string = 'value'): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new DecodeError(`${label} is not valid JSON`, label, error);
  }

  return schema.parse(parsed, label);
}

/** Assigns an own property, so keys such as `__proto__` stay plain data. */
export function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
