import { randomUUID } from 'crypto';
import { QueryFailedError } from 'typeorm';
import { School } from '../../src/school/entities/school.entity';
import { User } from '../../src/user/entities/user.entity';
import { Clock } from '../../src/common/time/clock';
import { CodeGenerator } from '../../src/common/random/code-generator';

type Row = { id: string; createdAt?: Date };
type Where<T> = Partial<Record<keyof T, unknown>>;

const uniqueViolation = (column: string) =>
  new QueryFailedError('INSERT/UPDATE', [], Object.assign(new Error(`duplicate key value violates unique constraint on ${column}`), { code: '23505' }));

/**
 * Just enough of a TypeORM Repository for the services under test: equality
 * `where` clauses, unique columns, conditional `update` reporting `affected`.
 * Rows are copied on the way in and out, as a database would.
 */
export class InMemoryRepository<T extends Row> {
  readonly rows: T[] = [];

  constructor(
    private readonly factory: () => T,
    private readonly uniqueColumns: (keyof T)[] = [],
    private readonly clock?: Clock,
  ) {}

  create(data: Partial<T>): T {
    return Object.assign(this.factory(), data);
  }

  async findOne(options: { where: Where<T> }): Promise<T | null> {
    const row = this.rows.find((candidate) => this.matches(candidate, options.where));
    return row ? this.copy(row) : null;
  }

  async find(options: { where: Where<T> }): Promise<T[]> {
    return this.rows.filter((row) => this.matches(row, options.where)).map((row) => this.copy(row));
  }

  async save(entity: T): Promise<T> {
    const stored: T = Object.assign(this.copy(entity), {
      id: entity.id || randomUUID(),
      createdAt: entity.createdAt ?? (this.clock ? this.clock.now() : new Date()),
    });
    this.assertUnique(stored);

    const index = this.rows.findIndex((row) => row.id === stored.id);
    if (index >= 0) this.rows[index] = stored;
    else this.rows.push(stored);
    return this.copy(stored);
  }

  async update(criteria: Where<T> | string, patch: Partial<T>): Promise<{ affected: number }> {
    const selects = (row: T) =>
      typeof criteria === 'string' ? row.id === criteria : this.matches(row, criteria);
    let affected = 0;
    for (let i = 0; i < this.rows.length; i++) {
      if (!selects(this.rows[i])) continue;
      const next = { ...this.rows[i], ...patch };
      this.assertUnique(next);
      this.rows[i] = next;
      affected++;
    }
    return { affected };
  }

  private matches(row: T, where: Where<T>): boolean {
    return Object.entries(where).every(([key, value]) => Reflect.get(row, key) === value);
  }

  private assertUnique(candidate: T) {
    for (const column of this.uniqueColumns) {
      const value = candidate[column];
      if (value === null || value === undefined) continue;
      if (this.rows.some((row) => row.id !== candidate.id && row[column] === value)) {
        throw uniqueViolation(String(column));
      }
    }
  }

  private copy(row: T): T {
    return Object.assign(this.factory(), row);
  }
}

export class FakeClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date) {
    this.current = date;
  }

  advance(ms: number) {
    this.current = new Date(this.current.getTime() + ms);
  }
}

/** Hands out the scripted codes in order, then falls back to a counter. */
export class ScriptedCodeGenerator implements CodeGenerator {
  calls = 0;
  private fallback = 10000;

  constructor(private readonly codes: string[] = []) {}

  push(...codes: string[]) {
    this.codes.push(...codes);
  }

  randomDigits(length: number): string {
    this.calls++;
    const next = this.codes.shift();
    if (next !== undefined) return next;
    this.fallback++;
    return String(this.fallback).padStart(length, '0').slice(-length);
  }
}

export interface InMemoryDatabase {
  schools: InMemoryRepository<School>;
  users: InMemoryRepository<User>;
  manager: {
    getRepository(target: unknown): InMemoryRepository<School> | InMemoryRepository<User>;
    create(target: unknown, data: Partial<School> & Partial<User>): School | User;
    save<E extends School | User>(entity: E): Promise<E>;
  };
  dataSource: {
    transaction<R>(work: (manager: InMemoryDatabase['manager']) => Promise<R>): Promise<R>;
  };
}

/** School and user tables plus a DataSource whose transactions run straight through. */
export function createInMemoryDatabase(clock: Clock): InMemoryDatabase {
  const schools = new InMemoryRepository<School>(() => new School(), ['name', 'abbreviation', 'joinCode'], clock);
  const users = new InMemoryRepository<User>(() => new User(), ['email'], clock);

  const repositoryFor = (target: unknown) => {
    if (target === School) return schools;
    if (target === User) return users;
    throw new Error(`No in-memory repository for ${String(target)}`);
  };

  const manager: InMemoryDatabase['manager'] = {
    getRepository: repositoryFor,
    create(target, data) {
      return target === School ? schools.create(data) : users.create(data);
    },
    async save<E extends School | User>(entity: E): Promise<E> {
      if (entity instanceof School) {
        const saved: School = await schools.save(entity);
        return Object.assign(entity, saved);
      }
      if (entity instanceof User) {
        const saved: User = await users.save(entity);
        return Object.assign(entity, saved);
      }
      throw new Error('Unsupported entity');
    },
  };

  return {
    schools,
    users,
    manager,
    dataSource: {
      transaction: (work) => work(manager),
    },
  };
}
