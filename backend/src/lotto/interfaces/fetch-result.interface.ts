/**
 * Every way the live retrieval can fail.
 * Each one resolves to the fallback dataset; none is rethrown.
 */
export type FetchError =
  | { kind: 'transport'; message: string }
  | { kind: 'http-status'; status: number }
  | { kind: 'table-not-found' }
  | { kind: 'table-shape'; columns: number }
  | { kind: 'row-count'; rows: number }
  | { kind: 'unexpected'; message: string };

export type FetchFailureKind = FetchError['kind'];

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'transport':
      return `transport error: ${error.message}`;
    case 'http-status':
      return `unexpected HTTP status ${error.status}`;
    case 'table-not-found':
      return 'no table carrying the win-count marker';
    case 'table-shape':
      return `table too narrow (${error.columns} columns)`;
    case 'row-count':
      return `expected 45 numbered rows, parsed ${error.rows}`;
    case 'unexpected':
      return `unexpected error: ${error.message}`;
  }
}
