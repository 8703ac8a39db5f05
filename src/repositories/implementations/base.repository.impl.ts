import { QueryResultRow } from 'pg';
import { BaseRepository } from '../interfaces/base.repository';
import {
  EntityDescriptor,
  ListOptions,
  NumericKeyOf,
  SortDirection,
} from '../../types/descriptor.types';
import { Session } from '../../types/session.types';
import { DATABASE } from '../../constants';
import { DataAccessError, NotFoundError, ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const SORT_DIRECTIONS: readonly SortDirection[] = ['ASC', 'DESC'];

/**
 * Keys outside the SERIAL range can never match a row; binding them would
 * fail with an out-of-range error instead
 */
function isStorableKey(id: number): boolean {
  return Number.isSafeInteger(id) && id >= 1 && id <= DATABASE.MAX_SERIAL_KEY;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Base repository implementation providing CRUD for any table.
 * Bound to one session and one descriptor; entity repositories extend it
 * only to add queries.
 */
export class BaseRepositoryImpl<
  T extends QueryResultRow,
  K extends NumericKeyOf<T>,
  C extends object,
> implements BaseRepository<T, C>
{
  private readonly tableName: string;
  private readonly keyColumn: string;
  private readonly selectList: string;

  constructor(
    protected readonly session: Session,
    protected readonly descriptor: EntityDescriptor<T, K>
  ) {
    this.tableName = quoteIdentifier(descriptor.table);
    this.keyColumn = quoteIdentifier(descriptor.primaryKey);
    this.selectList = [descriptor.primaryKey, ...descriptor.attributes]
      .map(quoteIdentifier)
      .join(', ');
  }

  async getById(id: number): Promise<T | null> {
    if (!isStorableKey(id)) {
      return null;
    }
    const result = await this.session.query<T>(
      `SELECT ${this.selectList} FROM ${this.tableName} WHERE ${this.keyColumn} = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async list(options: ListOptions<T> = {}): Promise<T[]> {
    const params: unknown[] = [];
    let text = `SELECT ${this.selectList} FROM ${this.tableName}`;
    text += this.buildWhere(options.where, params);
    text += this.buildOrderBy(options.orderBy);

    if (options.limit !== undefined) {
      params.push(this.assertCount('limit', options.limit));
      text += ` LIMIT $${params.length}`;
    }

    if (options.offset !== undefined) {
      params.push(this.assertCount('offset', options.offset));
      text += ` OFFSET $${params.length}`;
    }

    const result = await this.session.query<T>(text, params);
    return result.rows;
  }

  async create(attributes: C): Promise<T> {
    const values = this.collectAttributes(attributes);

    let text: string;
    if (values.length === 0) {
      text = `INSERT INTO ${this.tableName} DEFAULT VALUES RETURNING ${this.selectList}`;
    } else {
      const columns = values.map(([column]) => quoteIdentifier(column)).join(', ');
      const placeholders = values.map((_, index) => `$${index + 1}`).join(', ');
      text = `INSERT INTO ${this.tableName} (${columns}) VALUES (${placeholders}) RETURNING ${this.selectList}`;
    }

    const result = await this.session.query<T>(
      text,
      values.map(([, value]) => value)
    );

    const row = result.rows[0];
    if (!row) {
      throw new DataAccessError(`Insert into ${this.descriptor.table} returned no row`);
    }

    logger.debug('Repository', `${this.descriptor.name} created`, {
      sessionId: this.session.id,
      id: row[this.descriptor.primaryKey],
    });
    return row;
  }

  async update(id: number, attributes: Partial<C>): Promise<T> {
    const values = this.collectAttributes(attributes);
    if (!isStorableKey(id)) {
      throw new NotFoundError(this.descriptor.name, id);
    }

    if (values.length === 0) {
      const current = await this.getById(id);
      if (!current) {
        throw new NotFoundError(this.descriptor.name, id);
      }
      return current;
    }

    const assignments = values
      .map(([column], index) => `${quoteIdentifier(column)} = $${index + 1}`)
      .join(', ');
    const params = values.map(([, value]) => value);
    params.push(id);

    const result = await this.session.query<T>(
      `UPDATE ${this.tableName} SET ${assignments} WHERE ${this.keyColumn} = $${params.length} RETURNING ${this.selectList}`,
      params
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(this.descriptor.name, id);
    }

    logger.debug('Repository', `${this.descriptor.name} updated`, {
      sessionId: this.session.id,
      id,
    });
    return row;
  }

  async delete(id: number): Promise<boolean> {
    if (!isStorableKey(id)) {
      return false;
    }
    const result = await this.session.query(
      `DELETE FROM ${this.tableName} WHERE ${this.keyColumn} = $1 RETURNING ${this.keyColumn}`,
      [id]
    );

    const deleted = result.rows.length > 0;
    if (deleted) {
      logger.debug('Repository', `${this.descriptor.name} deleted`, {
        sessionId: this.session.id,
        id,
      });
    }
    return deleted;
  }

  async exists(id: number): Promise<boolean> {
    if (!isStorableKey(id)) {
      return false;
    }
    const result = await this.session.query(
      `SELECT 1 AS present FROM ${this.tableName} WHERE ${this.keyColumn} = $1 LIMIT 1`,
      [id]
    );
    return result.rows.length > 0;
  }

  async count(where?: Partial<T>): Promise<number> {
    const params: unknown[] = [];
    const result = await this.session.query<{ count: string | number }>(
      `SELECT COUNT(*) AS "count" FROM ${this.tableName}${this.buildWhere(where, params)}`,
      params
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  /**
   * First row matching an equality filter, in key order
   */
  protected async findOne(where: Partial<T>): Promise<T | null> {
    const rows = await this.list({ where, limit: 1 });
    return rows[0] ?? null;
  }

  private isColumn(name: string): boolean {
    return name === this.descriptor.primaryKey || this.isAttribute(name);
  }

  private isAttribute(name: string): boolean {
    return this.descriptor.attributes.some(attribute => attribute === name);
  }

  /**
   * Validate write input against the descriptor; undefined values are skipped
   */
  private collectAttributes(input: object): Array<[string, unknown]> {
    const entries: Array<[string, unknown]> = Object.entries(input);
    const values: Array<[string, unknown]> = [];

    for (const [name, value] of entries) {
      if (value === undefined) {
        continue;
      }
      if (name === this.descriptor.primaryKey) {
        throw new ValidationError(
          `${this.descriptor.name}.${name} is generated and cannot be written`,
          { entity: this.descriptor.name }
        );
      }
      if (!this.isAttribute(name)) {
        throw new ValidationError(`Unknown attribute "${name}" for ${this.descriptor.name}`, {
          entity: this.descriptor.name,
        });
      }
      values.push([name, value]);
    }

    return values;
  }

  private buildWhere(where: Partial<T> | undefined, params: unknown[]): string {
    if (!where) {
      return '';
    }

    const entries: Array<[string, unknown]> = Object.entries(where);
    const conditions: string[] = [];

    for (const [name, value] of entries) {
      if (value === undefined) {
        continue;
      }
      if (!this.isColumn(name)) {
        throw new ValidationError(`Unknown column "${name}" for ${this.descriptor.name}`, {
          entity: this.descriptor.name,
        });
      }
      if (value === null) {
        conditions.push(`${quoteIdentifier(name)} IS NULL`);
      } else {
        params.push(value);
        conditions.push(`${quoteIdentifier(name)} = $${params.length}`);
      }
    }

    return conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
  }

  private buildOrderBy(orderBy: ListOptions<T>['orderBy']): string {
    if (!orderBy || orderBy.column === this.descriptor.primaryKey) {
      const direction = orderBy ? this.assertDirection(orderBy.direction) : 'ASC';
      return ` ORDER BY ${this.keyColumn} ${direction}`;
    }

    if (!this.isColumn(orderBy.column)) {
      throw new ValidationError(
        `Unknown column "${orderBy.column}" for ${this.descriptor.name}`,
        { entity: this.descriptor.name }
      );
    }

    // Key as tiebreaker keeps the order stable
    return ` ORDER BY ${quoteIdentifier(orderBy.column)} ${this.assertDirection(orderBy.direction)}, ${this.keyColumn} ASC`;
  }

  private assertDirection(direction: SortDirection | undefined): SortDirection {
    if (direction === undefined) {
      return 'ASC';
    }
    if (!SORT_DIRECTIONS.includes(direction)) {
      throw new ValidationError(`Invalid sort direction "${direction}"`, {
        entity: this.descriptor.name,
      });
    }
    return direction;
  }

  private assertCount(option: 'limit' | 'offset', value: number): number {
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`${option} must be a non-negative integer`, {
        entity: this.descriptor.name,
      });
    }
    return value;
  }
}
