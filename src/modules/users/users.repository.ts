import { Pool } from 'pg';
import { Email, Metadata, User, UserId, UserRepository } from '../../domain';
import { UserErrors } from '../../utils/exceptions';
import { isUniqueViolation, withDbErrorHandling } from '../../utils/db-error-handler';

interface UserRow {
  id: string;
  name: string;
  email: string;
  age: number | null;
  metadata: Metadata | null;
  created_at: Date;
  updated_at: Date;
}

function userFromDatabase(row: UserRow): User {
  return User.fromDict({
    user_id: row.id,
    name: row.name,
    email: row.email,
    age: row.age,
    metadata: row.metadata ?? {},
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  });
}

export class UsersRepository implements UserRepository {
  constructor(private readonly db: Pool) {}

  /**
   * Insert a new user
   * @throws AlreadyExistsException on a duplicate id or email
   */
  async create(user: User): Promise<User> {
    const record = user.toDict();
    return withDbErrorHandling('create user', async () => {
      try {
        const result = await this.db.query<UserRow>(
          `INSERT INTO users (id, name, email, age, metadata, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7)
           RETURNING *`,
          [
            record.user_id,
            record.name,
            record.email,
            record.age,
            JSON.stringify(record.metadata),
            record.created_at,
            record.updated_at,
          ]
        );
        return userFromDatabase(result.rows[0]);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw UserErrors.alreadyExists(record.email);
        }
        throw error;
      }
    });
  }

  async getById(userId: UserId): Promise<User | null> {
    return withDbErrorHandling('get user', async () => {
      const result = await this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [userId.value]);
      return result.rows.length > 0 ? userFromDatabase(result.rows[0]) : null;
    });
  }

  async getByEmail(email: Email): Promise<User | null> {
    return withDbErrorHandling('get user by email', async () => {
      const result = await this.db.query<UserRow>('SELECT * FROM users WHERE email = $1', [email.value]);
      return result.rows.length > 0 ? userFromDatabase(result.rows[0]) : null;
    });
  }

  /**
   * Overwrite the mutable fields. Concurrent updates are last-write-wins.
   */
  async update(user: User): Promise<User> {
    const record = user.toDict();
    return withDbErrorHandling('update user', async () => {
      const result = await this.db.query<UserRow>(
        `UPDATE users
         SET name = $2, age = $3, metadata = $4, updated_at = $5
         WHERE id = $1
         RETURNING *`,
        [record.user_id, record.name, record.age, JSON.stringify(record.metadata), record.updated_at]
      );
      if (result.rows.length === 0) {
        throw UserErrors.notFound(record.user_id);
      }
      return userFromDatabase(result.rows[0]);
    });
  }

  async delete(userId: UserId): Promise<boolean> {
    return withDbErrorHandling('delete user', async () => {
      const result = await this.db.query('DELETE FROM users WHERE id = $1', [userId.value]);
      if (!result.rowCount) {
        throw UserErrors.notFound(userId.value);
      }
      return true;
    });
  }
}
