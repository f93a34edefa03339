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

class NumberNode implements JotSchema<number> {
  constructor(readonly options: { integer?: boolean; min?: number } = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }
    if (this.options.min !== undefined && value < this.options.min) {
      throw new TypeError(`${path} must be at least ${this.options.min}`);
    }

    return value;
  }
}

class BooleanNode implements JotSchema<boolean> {
  parse(value: unknown, path: string = 'value'): boolean {
    if (typeof value !== 'boolean') {
      throw new TypeError(`${path} must be a boolean`);
    }

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

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    return this.inner.parse(value, path);
  }
}

export interface ObjectNodeOptions {
  allowAdditionalProperties?: boolean;
}

class ObjectNode<Shape extends Record<string, JotSchema<unknown>>> implements JotSchema<{ [K in keyof Shape]: InferJot<Shape[K]> }> {
  constructor(readonly shape: Shape, readonly options: ObjectNodeOptions = {}) {}

  parse(value: unknown, path: string = 'value') {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const record = value as Record<string, unknown>;
    if (!this.options.allowAdditionalProperties) {
      const unknownKey = Object.keys(record).find((key) => !(key in this.shape));
      if (unknownKey !== undefined) {
        throw new TypeError(`${path}.${unknownKey} is not a recognized property`);
      }
    }

    const result: Record<string, unknown> = {};
    for (const key of Object.keys(this.shape)) {
      const node = this.shape[key]!;
      result[key] = node.parse(record[key], `${path}.${key}`);
    }

    return result as { [K in keyof Shape]: InferJot<Shape[K]> };
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (): JotSchema<string> => new StringNode(),
  number: (options?: { integer?: boolean; min?: number }): JotSchema<number> => new NumberNode(options),
  boolean: (): JotSchema<boolean> => new BooleanNode(),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  object: <Shape extends Record<string, JotSchema<unknown>>>(shape: Shape, options?: ObjectNodeOptions) =>
    new ObjectNode(shape, options),
};
