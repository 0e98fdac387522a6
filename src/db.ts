import { Pool, PoolClient, QueryResult } from 'pg';
import sqlite3 from 'sqlite3';
import { open, Database as SQLiteDatabase } from 'sqlite';
import path from 'path';
import fs from 'fs';
import { config } from './config';
import { ensureFilePrivate, ensureParentDirectoryPrivate } from './security/filesystem';

export interface DBRunResult {
    lastID?: number;
    changes?: number;
}

export type DatabaseDialect = 'sqlite' | 'postgres';

// ------------------------------------------------------------------
// INTERFACE ASTRAZIONE DB
// ------------------------------------------------------------------
export interface DatabaseManager {
    readonly dialect: DatabaseDialect;
    query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>;
    get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined>;
    exec(sql: string, params?: unknown[]): Promise<void>;
    run(sql: string, params?: unknown[]): Promise<DBRunResult>;
    /**
     * Esegue `callback` su una connessione dedicata dentro BEGIN/COMMIT.
     * Un errore fa ROLLBACK e viene rilanciato. Chiamate annidate riusano
     * la transazione esterna.
     */
    transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

// ------------------------------------------------------------------
// WRAPPER SQLITE
// ------------------------------------------------------------------

// Sessione legata alla singola connessione sqlite, usata anche come handle di transazione.
class SQLiteSession implements DatabaseManager {
    readonly dialect = 'sqlite' as const;

    constructor(private readonly db: SQLiteDatabase) {}

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        return this.db.all<T[]>(sql, params);
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        return this.db.get<T>(sql, params);
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        // più statement solo senza parametri, singolo statement con parametri
        if (params && params.length > 0) {
            await this.db.run(sql, params);
        } else {
            await this.db.exec(sql);
        }
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.db.run(sql, params);
        return {
            lastID: result.lastID,
            changes: result.changes,
        };
    }

    async transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
        return callback(this);
    }

    async close(): Promise<void> {
        await this.db.close();
    }
}

/**
 * Una sola connessione sqlite per processo: statement e transazioni vengono
 * serializzati in coda, così una transazione aperta non assorbe statement
 * di altri flussi asincroni.
 */
class SQLiteManager implements DatabaseManager {
    readonly dialect = 'sqlite' as const;
    private readonly session: SQLiteSession;
    private tail: Promise<void> = Promise.resolve();

    constructor(db: SQLiteDatabase) {
        this.session = new SQLiteSession(db);
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const next = this.tail.then(task);
        this.tail = next.then(
            () => undefined,
            () => undefined
        );
        return next;
    }

    query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        return this.enqueue(() => this.session.query<T>(sql, params));
    }

    get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        return this.enqueue(() => this.session.get<T>(sql, params));
    }

    exec(sql: string, params?: unknown[]): Promise<void> {
        return this.enqueue(() => this.session.exec(sql, params));
    }

    run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        return this.enqueue(() => this.session.run(sql, params));
    }

    transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
        return this.enqueue(async () => {
            await this.session.exec('BEGIN IMMEDIATE');
            try {
                const result = await callback(this.session);
                await this.session.exec('COMMIT');
                return result;
            } catch (error) {
                await this.session.exec('ROLLBACK');
                throw error;
            }
        });
    }

    close(): Promise<void> {
        return this.enqueue(() => this.session.close());
    }
}

// ------------------------------------------------------------------
// WRAPPER POSTGRES
// ------------------------------------------------------------------

// Adattatore sintassi: converte i `?` di SQLite in `$1`, `$2` di Postgres
function adaptParams(sql: string): string {
    let count = 1;
    return sql.replace(/\?/g, () => `$${count++}`);
}

export function normalizeSqlForPostgres(sql: string): string {
    let normalized = adaptParams(sql);

    normalized = normalized.replace(/\bBEGIN IMMEDIATE\b/gi, 'BEGIN');

    const hadInsertOrIgnore = /\bINSERT\s+OR\s+IGNORE\s+INTO\b/i.test(normalized);
    normalized = normalized.replace(/\bINSERT\s+OR\s+IGNORE\s+INTO\b/gi, 'INSERT INTO');
    if (hadInsertOrIgnore && !/\bON\s+CONFLICT\b/i.test(normalized)) {
        normalized = normalized.replace(/;\s*$/, '');
        normalized = `${normalized} ON CONFLICT DO NOTHING`;
    }

    return normalized;
}

type PgQueryFn = (text: string, values?: unknown[]) => Promise<QueryResult>;

function toRunResult(result: QueryResult): DBRunResult {
    // lastID disponibile solo con `RETURNING id`; rowCount mappato su changes
    const first: unknown = result.rows[0];
    let parsedLastId: number | undefined;
    if (first && typeof first === 'object' && 'id' in first) {
        const rowId = first.id;
        if (typeof rowId === 'number') {
            parsedLastId = rowId;
        } else if (typeof rowId === 'string' && /^[0-9]+$/.test(rowId)) {
            parsedLastId = Number.parseInt(rowId, 10);
        }
    }
    return {
        lastID: parsedLastId,
        changes: result.rowCount ?? undefined,
    };
}

class PostgresSession implements DatabaseManager {
    readonly dialect = 'postgres' as const;

    constructor(private readonly execute: PgQueryFn) {}

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        const result = await this.execute(normalizeSqlForPostgres(sql), params);
        return result.rows;
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        const result = await this.execute(normalizeSqlForPostgres(sql), params);
        return result.rows[0];
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        await this.execute(normalizeSqlForPostgres(sql), params);
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.execute(normalizeSqlForPostgres(sql), params);
        return toRunResult(result);
    }

    async transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
        return callback(this);
    }

    async close(): Promise<void> {
        // La sessione di transazione non possiede la connessione.
    }
}

class PostgresManager extends PostgresSession {
    private readonly pool: Pool;

    constructor(connectionString: string) {
        const pool = new Pool({ connectionString });
        super((text, values) => pool.query(text, values));
        this.pool = pool;
    }

    override async transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
        const client: PoolClient = await this.pool.connect();
        const session = new PostgresSession((text, values) => client.query(text, values));
        try {
            await client.query('BEGIN');
            try {
                const result = await callback(session);
                await client.query('COMMIT');
                return result;
            } catch (error) {
                await client.query('ROLLBACK');
                throw error;
            }
        } finally {
            client.release();
        }
    }

    override async close(): Promise<void> {
        await this.pool.end();
    }
}

// ------------------------------------------------------------------
// MIGRAZIONI
// ------------------------------------------------------------------

function resolveMigrationDirectory(): string {
    const cwdMigrations = path.resolve(process.cwd(), 'src', 'db', 'migrations');
    if (fs.existsSync(cwdMigrations)) {
        return cwdMigrations;
    }
    const compiledMigrations = path.resolve(__dirname, 'db', 'migrations');
    if (fs.existsSync(compiledMigrations)) {
        return compiledMigrations;
    }
    throw new Error('Cartella migrazioni non trovata.');
}

function translateMigrationForPostgres(sql: string): string {
    // I file nascono in dialetto sqlite
    return sql
        .replace(/\bDATETIME\b(?!\s*\()/gi, 'TIMESTAMP')
        .replace(/INTEGER PRIMARY KEY AUTOINCREMENT/gi, 'SERIAL PRIMARY KEY');
}

export async function applyMigrations(database: DatabaseManager): Promise<string[]> {
    const idColumn = database.dialect === 'postgres' ? 'SERIAL PRIMARY KEY' : 'INTEGER PRIMARY KEY AUTOINCREMENT';
    await database.exec(`
        CREATE TABLE IF NOT EXISTS _migrations (
            id ${idColumn},
            name TEXT NOT NULL UNIQUE,
            applied_at TEXT NOT NULL
        );
    `);

    const migrationDir = resolveMigrationDirectory();
    const files = fs
        .readdirSync(migrationDir)
        .filter((file) => file.endsWith('.sql'))
        .sort((a, b) => a.localeCompare(b));

    const applied: string[] = [];
    for (const fileName of files) {
        const alreadyApplied = await database.get<{ count: string | number }>(
            `SELECT COUNT(*) as count FROM _migrations WHERE name = ?`,
            [fileName]
        );
        // Postgres restituisce COUNT come stringa (int8)
        if (Number(alreadyApplied?.count ?? 0) > 0) {
            continue;
        }

        const raw = fs.readFileSync(path.join(migrationDir, fileName), 'utf8');
        const sql = database.dialect === 'postgres' ? translateMigrationForPostgres(raw) : raw;

        try {
            await database.transaction(async (tx) => {
                // file intero in un colpo solo: niente split naive su ';'
                await tx.exec(sql);
                await tx.run(`INSERT OR IGNORE INTO _migrations (name, applied_at) VALUES (?, ?)`, [
                    fileName,
                    new Date().toISOString(),
                ]);
            });
        } catch (error) {
            console.error(`Migration error on file ${fileName}`);
            throw error;
        }
        applied.push(fileName);
    }
    return applied;
}

// ------------------------------------------------------------------
// ISTANZA E INIZIALIZZAZIONE
// ------------------------------------------------------------------

export interface OpenDatabaseOptions {
    databaseUrl?: string;
    dbPath?: string;
}

export async function openDatabase(options: OpenDatabaseOptions = {}): Promise<DatabaseManager> {
    const databaseUrl = options.databaseUrl ?? config.databaseUrl;
    if (databaseUrl && databaseUrl.startsWith('postgres')) {
        console.log(`📡 Connecting to PostgreSQL database...`);
        const manager = new PostgresManager(databaseUrl);
        try {
            await manager.query('SELECT 1');
        } catch (error) {
            console.error('❌ Failed to connect to PostgreSQL:', error);
            await manager.close();
            throw error;
        }
        return manager;
    }

    const dbPath = options.dbPath ?? config.dbPath;
    if (process.env.NODE_ENV === 'production' && !config.allowSqliteInProduction && dbPath !== ':memory:') {
        throw new Error(
            'SQLite in produzione bloccato. Fornisci un DATABASE_URL (PostgreSQL) oppure imposta ALLOW_SQLITE_IN_PRODUCTION=true esplicitamente.'
        );
    }

    const inMemory = dbPath === ':memory:';
    if (!inMemory) {
        ensureParentDirectoryPrivate(dbPath);
    }

    const sqliteDb = await open({
        filename: dbPath,
        driver: sqlite3.Database,
    });

    if (!inMemory) {
        await sqliteDb.exec(`PRAGMA journal_mode = WAL;`);
    }
    await sqliteDb.exec(`PRAGMA busy_timeout = 5000;`);
    await sqliteDb.exec(`PRAGMA synchronous = NORMAL;`);
    await sqliteDb.exec(`PRAGMA foreign_keys = ON;`);
    if (!inMemory) {
        ensureFilePrivate(dbPath);
    }

    return new SQLiteManager(sqliteDb);
}

let dbInstance: DatabaseManager | null = null;

export async function getDatabase(): Promise<DatabaseManager> {
    if (dbInstance) return dbInstance;
    dbInstance = await openDatabase();
    return dbInstance;
}

export async function initDatabase(): Promise<DatabaseManager> {
    const database = await getDatabase();
    await applyMigrations(database);
    return database;
}

export async function closeDatabase(): Promise<void> {
    if (dbInstance) {
        const instance = dbInstance;
        dbInstance = null;
        await instance.close();
    }
}
