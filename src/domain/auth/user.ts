/**
 * User domain entity.
 * Rows are created once and afterwards only read or deleted.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

/**
 * User as it may leave the service: never carries the password hash.
 */
export type PublicUser = Omit<User, 'passwordHash'>;

export interface NewUser {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    createdAt: user.createdAt,
  };
}
