import * as sql from 'mssql';
import { BlobSettings, EavsConfig, getSqlConfig } from './config-loader';
import { ColumnDefinition, RowTerminator } from './csv-inspector';
import { RetryOptions, retryWithBackoff } from './error-handler';
import { bracket, qualifiedName } from './sections';

export type Row = Record<string, unknown>;
export type QueryParams = Record<string, string | number>;

export interface BulkLoadRequest {
  schema: string;
  table: string;
  columns: ColumnDefinition[];
  /** Blob path relative to the container, e.g. 2024/a_reg.csv */
  blobPath: string;
  rowTerminator: RowTerminator;
  blob: BlobSettings;
}

/**
 * Warehouse operations used by the EAVS scripts. One call at a time; no call
 * is issued before the previous one has settled.
 */
export interface Warehouse {
  query(sqlText: string, params?: QueryParams): Promise<Row[]>;
  /** Run a statement, returning the total rows affected. */
  execute(sqlText: string, params?: QueryParams): Promise<number>;
  schemaExists(schema: string): Promise<boolean>;
  ensureSchema(schema: string): Promise<void>;
  tableExists(schema: string, table: string): Promise<boolean>;
  /** Column names in ordinal order; empty when the table does not exist. */
  getColumns(schema: string, table: string): Promise<string[]>;
  countRows(schema: string, table: string): Promise<number>;
  /** Stored definition of a view, or null when there is no such view. */
  getViewDefinition(schema: string, view: string): Promise<string | null>;
  /** Full replace of a view from a CREATE OR ALTER VIEW statement. */
  replaceView(definition: string): Promise<void>;
  /** Drop and recreate `table` from the CSV at `blobPath`, returning the loaded row count. */
  loadCsvFromBlob(request: BulkLoadRequest): Promise<number>;
  /** Drop and recreate `table` as a snapshot of `view`, returning its row count. */
  materializeView(schema: string, view: string, table: string): Promise<number>;
  close(): Promise<void>;
}

const CREDENTIAL_NAME = 'BlobSasCred';
const DATA_SOURCE_NAME = 'BlobStaging';

function escapeLiteral(value: string): string {
  return value.replace(/'/g, "''");
}

function toCount(value: unknown): number {
  return typeof value === 'number' ? value : Number(value ?? 0);
}

export function createTableSql(schema: string, table: string, columns: ColumnDefinition[]): string {
  const columnDefs = columns.map(col => `${bracket(col.name)} ${col.sqlType} NULL`).join(',\n  ');
  return `CREATE TABLE ${qualifiedName(schema, table)} (\n  ${columnDefs}\n)`;
}

export function bulkInsertSql(schema: string, table: string, blobPath: string, rowTerminator: RowTerminator): string {
  return `
    BULK INSERT ${qualifiedName(schema, table)}
    FROM '${escapeLiteral(blobPath)}'
    WITH (
      DATA_SOURCE = '${DATA_SOURCE_NAME}',
      FORMAT = 'CSV',
      FIRSTROW = 2,
      FIELDTERMINATOR = ',',
      ROWTERMINATOR = '${rowTerminator}',
      KEEPNULLS,
      CODEPAGE = '65001'
    )
  `;
}

/**
 * SQL Server / Azure SQL implementation over an mssql connection pool.
 * Transient errors are retried with backoff; drop-and-recreate loads make retries safe.
 */
export class SqlServerWarehouse implements Warehouse {
  private dataSourceLocation: string | null = null;

  private constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly retry: RetryOptions
  ) {}

  static async connect(config: EavsConfig): Promise<SqlServerWarehouse> {
    const retry: RetryOptions = { maxRetries: config.retry.maxRetries, baseDelay: config.retry.baseDelay };
    const pool = await retryWithBackoff(() => new sql.ConnectionPool(getSqlConfig(config)).connect(), retry);
    return new SqlServerWarehouse(pool, retry);
  }

  private async run(sqlText: string, params: QueryParams): Promise<sql.IResult<Row>> {
    return retryWithBackoff(() => {
      const request = this.pool.request();
      for (const [name, value] of Object.entries(params)) {
        request.input(name, value);
      }
      return request.query<Row>(sqlText);
    }, this.retry);
  }

  async query(sqlText: string, params: QueryParams = {}): Promise<Row[]> {
    const result = await this.run(sqlText, params);
    return result.recordset ?? [];
  }

  async execute(sqlText: string, params: QueryParams = {}): Promise<number> {
    const result = await this.run(sqlText, params);
    return result.rowsAffected.reduce((sum, n) => sum + n, 0);
  }

  async schemaExists(schema: string): Promise<boolean> {
    const rows = await this.query('SELECT 1 AS found FROM sys.schemas WHERE name = @schema', { schema });
    return rows.length > 0;
  }

  async ensureSchema(schema: string): Promise<void> {
    await this.execute(
      `IF NOT EXISTS (SELECT 1 FROM sys.schemas WHERE name = @schema)
        EXEC('CREATE SCHEMA ' + QUOTENAME(@schema))`,
      { schema }
    );
  }

  async tableExists(schema: string, table: string): Promise<boolean> {
    const rows = await this.query(
      `SELECT 1 AS found FROM INFORMATION_SCHEMA.TABLES
       WHERE TABLE_SCHEMA = @schema AND TABLE_NAME = @table`,
      { schema, table }
    );
    return rows.length > 0;
  }

  async getColumns(schema: string, table: string): Promise<string[]> {
    const rows = await this.query(
      `SELECT COLUMN_NAME FROM INFORMATION_SCHEMA.COLUMNS
       WHERE TABLE_SCHEMA = @schema AND TABLE_NAME = @table
       ORDER BY ORDINAL_POSITION`,
      { schema, table }
    );
    return rows.map(row => String(row['COLUMN_NAME']));
  }

  async countRows(schema: string, table: string): Promise<number> {
    const rows = await this.query(`SELECT COUNT_BIG(*) AS row_count FROM ${qualifiedName(schema, table)}`);
    return toCount(rows[0]?.['row_count']);
  }

  async getViewDefinition(schema: string, view: string): Promise<string | null> {
    const rows = await this.query(
      `SELECT m.definition
       FROM sys.sql_modules m
       JOIN sys.views v ON v.object_id = m.object_id
       JOIN sys.schemas s ON s.schema_id = v.schema_id
       WHERE s.name = @schema AND v.name = @view`,
      { schema, view }
    );
    const definition = rows[0]?.['definition'];
    return typeof definition === 'string' ? definition : null;
  }

  async replaceView(definition: string): Promise<void> {
    await this.execute(definition);
  }

  /**
   * Point the BlobStaging external data source at the container, once per connection
   */
  private async ensureBlobExternalDataSource(blob: BlobSettings): Promise<void> {
    if (this.dataSourceLocation === blob.containerLocation) {
      return;
    }
    const safeSas = escapeLiteral(escapeLiteral(blob.sasToken));
    const safeLocation = escapeLiteral(blob.containerLocation);

    console.log(`  Setting up External Data Source: ${blob.containerLocation}`);

    await this.execute(`
      IF EXISTS (SELECT 1 FROM sys.database_scoped_credentials WHERE name = '${CREDENTIAL_NAME}')
      BEGIN
        EXEC('ALTER DATABASE SCOPED CREDENTIAL [${CREDENTIAL_NAME}] WITH IDENTITY = ''SHARED ACCESS SIGNATURE'', SECRET = ''${safeSas}''');
      END
      ELSE
      BEGIN
        EXEC('CREATE DATABASE SCOPED CREDENTIAL [${CREDENTIAL_NAME}] WITH IDENTITY = ''SHARED ACCESS SIGNATURE'', SECRET = ''${safeSas}''');
      END
    `);

    await this.execute(`
      IF EXISTS (SELECT 1 FROM sys.external_data_sources WHERE name = '${DATA_SOURCE_NAME}')
      BEGIN
        DROP EXTERNAL DATA SOURCE [${DATA_SOURCE_NAME}];
      END
    `);

    await this.execute(`
      CREATE EXTERNAL DATA SOURCE [${DATA_SOURCE_NAME}]
      WITH (TYPE = BLOB_STORAGE, LOCATION = '${safeLocation}', CREDENTIAL = [${CREDENTIAL_NAME}])
    `);

    this.dataSourceLocation = blob.containerLocation;
    console.log(`    ✓ External Data Source ready`);
  }

  async loadCsvFromBlob(request: BulkLoadRequest): Promise<number> {
    const { schema, table, columns, blobPath, rowTerminator, blob } = request;

    await this.ensureSchema(schema);
    await this.execute(`DROP TABLE IF EXISTS ${qualifiedName(schema, table)}`);
    await this.execute(createTableSql(schema, table, columns));
    await this.ensureBlobExternalDataSource(blob);
    await this.execute(bulkInsertSql(schema, table, blobPath, rowTerminator));

    return this.countRows(schema, table);
  }

  async materializeView(schema: string, view: string, table: string): Promise<number> {
    const target = qualifiedName(schema, table);
    await this.execute(`DROP TABLE IF EXISTS ${target}`);
    await this.execute(`SELECT * INTO ${target} FROM ${qualifiedName(schema, view)}`);
    return this.countRows(schema, table);
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
