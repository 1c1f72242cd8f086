import Database from 'better-sqlite3';

const UNIQUE_VIOLATION = 'SQLITE_CONSTRAINT_UNIQUE';

/**
 * Which unique user field a SQLite error reports as violated, if any.
 * SQLite names the column: "UNIQUE constraint failed: users.username".
 */
export function violatedUserField(error: unknown): 'username' | 'email' | null {
  if (!(error instanceof Database.SqliteError) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }

  const column = /UNIQUE constraint failed: users\.(\w+)/.exec(error.message)?.[1];
  return column === 'username' || column === 'email' ? column : null;
}
