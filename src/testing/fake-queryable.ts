import { Queryable, Row } from '../database/queryable.interface';

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

/**
 * Records every statement; answers with rows queued per call, in order.
 */
export class FakeQueryable implements Queryable {
  readonly queries: RecordedQuery[] = [];
  private readonly responses: Row[][] = [];

  willReturn(...rows: Row[]): this {
    this.responses.push(rows);
    return this;
  }

  async query(text: string, values: unknown[] = []): Promise<{ rows: Row[] }> {
    this.queries.push({ text, values });
    return { rows: this.responses.shift() ?? [] };
  }
}
