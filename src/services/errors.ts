// Semantic catalog errors. Thrown as plain objects (not Error subclasses) so the
// code/data survive re-throwing through store and wrapper layers unchanged.
export type CatalogErrorCode =
  | 'AmbiguousMatch'
  | 'InvalidArrayAccess'
  | 'WrongDescriptorKind'
  | 'MissingExtension'
  | 'EmptyPatternInput'
  | 'InvalidSearchPredicate'
  | 'SnapshotInvalid';

export interface CatalogErrorShape<TData extends Record<string, unknown> = Record<string, unknown>> {
  code: CatalogErrorCode;
  message: string;
  data: TData;
  __catalog: true;
}

export function catalogError<TData extends Record<string, unknown>>(code: CatalogErrorCode, message: string, data: TData): never;
export function catalogError(code: CatalogErrorCode, message: string): never;
export function catalogError(code: CatalogErrorCode, message: string, data: Record<string, unknown> = {}): never {
  const err: CatalogErrorShape = { code, message, data, __catalog: true };
  // eslint-disable-next-line no-throw-literal
  throw err;
}

export function isCatalogError(e: unknown, code?: CatalogErrorCode): e is CatalogErrorShape {
  if(!e || typeof e !== 'object') return false;
  const maybe = e as { code?: unknown; message?: unknown; __catalog?: unknown };
  if(maybe.__catalog !== true || typeof maybe.code !== 'string' || typeof maybe.message !== 'string') return false;
  return code === undefined || maybe.code === code;
}

/** Best-effort message for logging an unknown thrown value. */
export function describeError(e: unknown): string {
  if(e instanceof Error) return e.message;
  if(isCatalogError(e)) return `${e.code}: ${e.message}`;
  return String(e);
}
