import { NotFoundError } from '@billmirror/domain-kernel';

/** The one row a `returning()` query produced for `id`. */
export function single<T>(rows: T[], entity: string, id: string): T {
  const [row] = rows;
  if (row === undefined) throw new NotFoundError(entity, id);
  return row;
}
