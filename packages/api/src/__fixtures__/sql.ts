import type { Sql } from '../utils/db';

/**
 * In-process stand-in for the postgres tagged template. Parameters render as
 * `?` and nested fragments are inlined, so tests assert on the statement
 * text and its values. Queries stay lazy until awaited, like the real client.
 */

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

export type Responder = (query: RecordedQuery) => unknown[] | Promise<unknown[]>;

export class FakeQuery implements RecordedQuery {
  executed = false;
  cancelled = false;
  private result?: Promise<unknown[]>;

  constructor(
    readonly text: string,
    readonly values: unknown[],
    private readonly respond: Responder
  ) {}

  cancel(): void {
    this.cancelled = true;
  }

  then<R1 = unknown[], R2 = never>(
    onFulfilled?: ((value: unknown[]) => R1 | PromiseLike<R1>) | null,
    onRejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    if (!this.result) {
      this.executed = true;
      this.result = Promise.resolve().then(() => this.respond(this));
    }
    return this.result.then(onFulfilled, onRejected);
  }
}

export function createFakeSql(respond: Responder = () => []) {
  const issued: FakeQuery[] = [];

  const tag = (strings: TemplateStringsArray, ...values: unknown[]): FakeQuery => {
    let text = strings[0];
    const params: unknown[] = [];
    values.forEach((value, i) => {
      if (value instanceof FakeQuery) {
        text += value.text;
        params.push(...value.values);
      } else {
        text += '?';
        params.push(value);
      }
      text += strings[i + 1];
    });

    const query = new FakeQuery(text.replace(/\s+/g, ' ').trim(), params, respond);
    issued.push(query);
    return query;
  };

  return {
    sql: tag as unknown as Sql,
    /** Statements that were actually sent, in order. */
    statements: () => issued.filter((query) => query.executed),
  };
}

export const hang = (): Promise<never> => new Promise<never>(() => {});

export function withCount(count: number): unknown[] {
  return Object.assign([], { count });
}
