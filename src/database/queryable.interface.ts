export type Row = Record<string, unknown>;

/**
 * The slice of pg's Pool the stores use. Tests pass an in-process fake.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
}
