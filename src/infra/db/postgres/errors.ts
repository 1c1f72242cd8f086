import pg from 'pg';

const UNIQUE_VIOLATION = '23505';

const CONSTRAINT_FIELDS: Record<string, 'username' | 'email'> = {
  users_username_key: 'username',
  users_email_key: 'email',
};

/**
 * Which unique user field a Postgres error reports as violated, if any.
 * Prefers the constraint name; falls back to the `Key (column)=(...)` detail.
 */
export function violatedUserField(error: unknown): 'username' | 'email' | null {
  if (!(error instanceof pg.DatabaseError) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }

  const byConstraint = error.constraint ? CONSTRAINT_FIELDS[error.constraint] : undefined;
  if (byConstraint) {
    return byConstraint;
  }

  const column = /^Key \((\w+)\)=/.exec(error.detail ?? '')?.[1];
  return column === 'username' || column === 'email' ? column : null;
}
