// Program Store - SQLite persistence for evolved strategies
// Keeps code, lineage and fitness; enforces the population bound and serves parent sampling

import BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import { z } from 'zod';
import logger from '../shared/logger';
import {
    EvolutionStoreError,
    InvalidArgumentError,
    NotFoundError,
    StorageError,
} from '../evolution-engine/errors';
import { MetricColumn, PRIMARY_METRIC, resolveMetric, validateMetrics } from '../evolution-engine/metrics';
import { Selector, RankedEntry, compareRanked } from '../evolution-engine/selector';
import {
    ExperimentSummary,
    FitnessMetrics,
    InsertOptions,
    Program,
    ProgramStoreOptions,
    SELECTION_STRATEGIES,
    SelectionStrategy,
} from '../evolution-engine/types';

interface ProgramRow {
    id: string;
    code: string;
    parent_id: string | null;
    generation: number;
    experiment: string | null;
    sharpe: number | null;
    calmar: number | null;
    max_dd: number | null;
    cagr: number | null;
    total_return: number | null;
    trade_count: number | null;
    win_rate: number | null;
    psr: number | null;
    net_sharpe: number | null;
    created_at: number;
}

interface RankRow {
    id: string;
    calmar: number | null;
    created_at: number;
}

interface ExperimentRow {
    name: string;
    count: number;
    scored_count: number;
    best_calmar: number | null;
    max_generation: number;
    created_at: number;
}

// Columns added after the first schema; opened databases are migrated in place
const MIGRATED_COLUMNS: Array<{ name: string; type: string }> = [
    { name: 'psr', type: 'REAL' },
    { name: 'net_sharpe', type: 'REAL' },
];

const storeOptionsSchema = z
    .object({
        populationSize: z.number().int().positive(),
        archiveSize: z.number().int().positive(),
    })
    .refine(o => o.archiveSize < o.populationSize, {
        message: 'archiveSize must be smaller than populationSize',
    });

const topKSchema = z.number().int().nonnegative();

const MEMORY_PATH = ':memory:';

export class ProgramStore {
    private db: BetterSqlite3.Database | null = null;
    private readonly dbPath: string;
    private readonly selector: Selector;

    readonly populationSize: number;
    readonly archiveSize: number;

    constructor(dbPath: string, options: ProgramStoreOptions = {}) {
        const sizes = storeOptionsSchema.safeParse({
            populationSize: options.populationSize ?? 500,
            archiveSize: options.archiveSize ?? 50,
        });
        if (!sizes.success) {
            throw new InvalidArgumentError(
                `Invalid store configuration: ${sizes.error.issues.map(i => i.message).join('; ')}`
            );
        }

        this.dbPath = dbPath;
        this.populationSize = sizes.data.populationSize;
        this.archiveSize = sizes.data.archiveSize;
        this.selector = new Selector({}, options.random ?? Math.random);
    }

    /**
     * Open the database, create the schema and apply migrations
     */
    initialize(): void {
        if (this.db) return;

        let db: BetterSqlite3.Database | null = null;
        try {
            if (this.dbPath !== MEMORY_PATH) {
                const dataDir = path.dirname(this.dbPath);
                if (!fs.existsSync(dataDir)) {
                    fs.mkdirSync(dataDir, { recursive: true });
                }
            }

            db = new BetterSqlite3(this.dbPath);
            if (this.dbPath !== MEMORY_PATH) {
                db.pragma('journal_mode = WAL');
            }
            db.pragma('busy_timeout = 5000');

            this.createTables(db);
            this.migrate(db);

            this.db = db;
            logger.info(`[ProgramStore] Initialized at ${this.dbPath} (population=${this.populationSize}, archive=${this.archiveSize})`);
        } catch (error) {
            logger.error('[ProgramStore] Failed to initialize:', error);
            if (db && db.open) {
                db.close();
            }
            throw new StorageError('initialize', error);
        }
    }

    private createTables(db: BetterSqlite3.Database): void {
        db.exec(`
            CREATE TABLE IF NOT EXISTS programs (
                id TEXT PRIMARY KEY,
                code TEXT NOT NULL,
                parent_id TEXT,
                generation INTEGER NOT NULL DEFAULT 0,
                experiment TEXT,
                sharpe REAL,
                calmar REAL,
                max_dd REAL,
                cagr REAL,
                total_return REAL,
                trade_count INTEGER,
                win_rate REAL,
                created_at REAL NOT NULL
            )
        `);

        db.exec(`CREATE INDEX IF NOT EXISTS idx_programs_calmar ON programs(calmar DESC, created_at)`);
        db.exec(`CREATE INDEX IF NOT EXISTS idx_programs_sharpe ON programs(sharpe DESC)`);
        db.exec(`CREATE INDEX IF NOT EXISTS idx_programs_experiment ON programs(experiment)`);
        db.exec(`CREATE INDEX IF NOT EXISTS idx_programs_created ON programs(created_at)`);

        // Pruned programs stay resolvable as parents for generation and lineage bookkeeping
        db.exec(`
            CREATE TABLE IF NOT EXISTS pruned_programs (
                id TEXT PRIMARY KEY,
                parent_id TEXT,
                generation INTEGER NOT NULL,
                experiment TEXT,
                created_at REAL NOT NULL,
                pruned_at REAL NOT NULL
            )
        `);
        db.exec(`CREATE INDEX IF NOT EXISTS idx_pruned_created ON pruned_programs(created_at)`);
    }

    private migrate(db: BetterSqlite3.Database): void {
        const existing = new Set(
            db.prepare<[], { name: string }>('PRAGMA table_info(programs)').all().map(column => column.name)
        );

        for (const column of MIGRATED_COLUMNS) {
            if (!existing.has(column.name)) {
                db.exec(`ALTER TABLE programs ADD COLUMN ${column.name} ${column.type}`);
                logger.info(`[ProgramStore] Migrated programs table: added ${column.name}`);
            }
        }
    }

    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    /**
     * Insert a program and prune in the same write transaction if the
     * population bound is exceeded. Returns the generated id.
     */
    insert(code: string, options: InsertOptions = {}): string {
        if (typeof code !== 'string' || code.trim().length === 0) {
            throw new InvalidArgumentError('Program code must be a non-empty string');
        }
        const metrics = options.metrics ? validateMetrics(options.metrics) : null;
        const parentId = options.parentId ?? null;
        if (parentId !== null && !uuidValidate(parentId)) {
            throw new InvalidArgumentError(`Malformed parent id: ${parentId}`);
        }
        const experiment = options.experiment ?? null;

        return this.execute('insert', db => {
            const txn = db.transaction((): string => {
                const generation = parentId === null ? 0 : this.resolveParentGeneration(db, parentId) + 1;
                const id = uuidv4();
                const createdAt = this.nextCreatedAt(db);

                db.prepare(`
                    INSERT INTO programs (
                        id, code, parent_id, generation, experiment,
                        sharpe, calmar, max_dd, cagr, total_return,
                        trade_count, win_rate, psr, net_sharpe, created_at
                    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
                `).run(id, code, parentId, generation, experiment, ...this.metricValues(metrics), createdAt);

                const pruned = this.pruneWithin(db);
                if (pruned > 0) {
                    logger.debug(`[ProgramStore] Insert of ${id} triggered pruning of ${pruned} programs`);
                }
                return id;
            });

            return txn.immediate();
        });
    }

    /**
     * Replace a program's metrics wholesale
     */
    updateMetrics(id: string, metrics: FitnessMetrics): void {
        const validated = validateMetrics(metrics);

        this.execute('updateMetrics', db => {
            const txn = db.transaction(() => {
                const result = db.prepare(`
                    UPDATE programs SET
                        sharpe = ?, calmar = ?, max_dd = ?, cagr = ?, total_return = ?,
                        trade_count = ?, win_rate = ?, psr = ?, net_sharpe = ?
                    WHERE id = ?
                `).run(...this.metricValues(validated), id);

                if (result.changes === 0) {
                    throw new NotFoundError(id);
                }
            });

            txn.immediate();
        });
    }

    /**
     * Get a live program by id; unknown and pruned ids return null
     */
    get(id: string): Program | null {
        return this.execute('get', db => this.getWithin(db, id));
    }

    /**
     * Top k scored programs by `metric`, descending, earlier insertion first on ties.
     * Omitting `experiment` ranks across all experiments.
     */
    topK(k: number = 10, metric: string = PRIMARY_METRIC, experiment?: string | null): Program[] {
        const column = resolveMetric(metric);
        if (!topKSchema.safeParse(k).success) {
            throw new InvalidArgumentError(`k must be a non-negative integer, got ${k}`);
        }
        if (k === 0) return [];

        return this.execute('topK', db => {
            const scope = this.scope(['calmar IS NOT NULL', `${column} IS NOT NULL`], experiment);
            return db
                .prepare<unknown[], ProgramRow>(`
                    SELECT * FROM programs ${scope.where}
                    ORDER BY ${column} DESC, created_at ASC
                    LIMIT ?
                `)
                .all(...scope.params, k)
                .map(row => this.toProgram(row));
        });
    }

    /**
     * Sample a parent for mutation.
     *
     * - `elite`: uniform over the top 10% by calmar (minimum one)
     * - `exploit`: calmar-weighted over scored programs
     * - `explore`: uniform over all programs, pending included
     *
     * Returns null when nothing in scope qualifies.
     */
    sample(strategy: string = 'exploit', experiment?: string | null): Program | null {
        const mode = parseStrategy(strategy);

        return this.execute('sample', db => {
            const read = db.transaction((): Program | null => {
                switch (mode) {
                    case 'elite':
                        return this.sampleElite(db, experiment);
                    case 'exploit':
                        return this.sampleExploit(db, experiment);
                    case 'explore':
                        return this.sampleExplore(db, experiment);
                }
            });
            return read.deferred();
        });
    }

    private sampleElite(db: BetterSqlite3.Database, experiment?: string | null): Program | null {
        const ranked = this.rankedScored(db, experiment);
        const pick = this.selector.pickElite(ranked);
        return pick ? this.getWithin(db, pick.id) : null;
    }

    private sampleExploit(db: BetterSqlite3.Database, experiment?: string | null): Program | null {
        const ranked = this.rankedScored(db, experiment);
        const pick = this.selector.pickWeighted(ranked, entry => entry.fitness ?? 0);
        return pick ? this.getWithin(db, pick.id) : null;
    }

    private sampleExplore(db: BetterSqlite3.Database, experiment?: string | null): Program | null {
        const scope = this.scope([], experiment);
        const total = db
            .prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM programs ${scope.where}`)
            .get(...scope.params);
        if (!total || total.total === 0) return null;

        const row = db
            .prepare<unknown[], ProgramRow>(`
                SELECT * FROM programs ${scope.where}
                ORDER BY created_at ASC
                LIMIT 1 OFFSET ?
            `)
            .get(...scope.params, this.selector.index(total.total));
        return row ? this.toProgram(row) : null;
    }

    /**
     * Scored programs best-first by calmar
     */
    private rankedScored(db: BetterSqlite3.Database, experiment?: string | null): RankedEntry[] {
        const scope = this.scope(['calmar IS NOT NULL'], experiment);
        return db
            .prepare<unknown[], RankRow>(`
                SELECT id, calmar, created_at FROM programs ${scope.where}
                ORDER BY calmar DESC, created_at ASC
            `)
            .all(...scope.params)
            .map(toRankedEntry);
    }

    /**
     * Chain from `id` back to its root. Stops early at a pruned parent.
     */
    getLineage(id: string): Program[] {
        return this.execute('getLineage', db => {
            const read = db.transaction((): Program[] => {
                const start = this.getWithin(db, id);
                if (!start) {
                    throw new NotFoundError(id);
                }

                const lineage: Program[] = [start];
                const seen = new Set<string>([start.id]);
                let parentId = start.parentId;

                while (parentId !== null && !seen.has(parentId)) {
                    const parent = this.getWithin(db, parentId);
                    if (!parent) break;
                    lineage.push(parent);
                    seen.add(parent.id);
                    parentId = parent.parentId;
                }

                return lineage;
            });
            return read.deferred();
        });
    }

    count(experiment?: string | null): number {
        return this.execute('count', db => {
            const scope = this.scope([], experiment);
            const row = db
                .prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM programs ${scope.where}`)
                .get(...scope.params);
            return row?.total ?? 0;
        });
    }

    /**
     * Delete the lowest-ranked programs outside the archive until the whole
     * store is within `populationSize`. Returns the number deleted.
     */
    prune(): number {
        return this.execute('prune', db => db.transaction(() => this.pruneWithin(db)).immediate());
    }

    /**
     * Named experiments with their live population, newest first
     */
    experiments(): ExperimentSummary[] {
        return this.execute('experiments', db =>
            db
                .prepare<[], ExperimentRow>(`
                    SELECT
                        experiment AS name,
                        COUNT(*) AS count,
                        COUNT(calmar) AS scored_count,
                        MAX(calmar) AS best_calmar,
                        MAX(generation) AS max_generation,
                        MIN(created_at) AS created_at
                    FROM programs
                    WHERE experiment IS NOT NULL
                    GROUP BY experiment
                    ORDER BY MIN(created_at) DESC
                `)
                .all()
                .map(row => ({
                    name: row.name,
                    count: row.count,
                    scoredCount: row.scored_count,
                    bestCalmar: row.best_calmar,
                    maxGeneration: row.max_generation,
                    createdAt: row.created_at,
                }))
        );
    }

    // ---------------------------------------------------------------------------
    // Internals. Everything below runs inside a caller's transaction.

    private pruneWithin(db: BetterSqlite3.Database): number {
        const live = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM programs').get();
        if (!live || live.total <= this.populationSize) return 0;

        const rows = db.prepare<[], RankRow>('SELECT id, calmar, created_at FROM programs').all();
        const ranked = rows.map(toRankedEntry).sort(compareRanked);
        const doomed = this.selector.planPrune(ranked, this.populationSize, this.archiveSize);

        const tombstone = db.prepare(`
            INSERT OR REPLACE INTO pruned_programs (id, parent_id, generation, experiment, created_at, pruned_at)
            SELECT id, parent_id, generation, experiment, created_at, ? FROM programs WHERE id = ?
        `);
        const remove = db.prepare('DELETE FROM programs WHERE id = ?');
        const prunedAt = Date.now();

        for (const id of doomed) {
            tombstone.run(prunedAt, id);
            remove.run(id);
        }

        logger.info(`[ProgramStore] Pruned ${doomed.length} programs (${rows.length} -> ${rows.length - doomed.length})`);
        return doomed.length;
    }

    private resolveParentGeneration(db: BetterSqlite3.Database, parentId: string): number {
        const live = db
            .prepare<[string], { generation: number }>('SELECT generation FROM programs WHERE id = ?')
            .get(parentId);
        if (live) return live.generation;

        const pruned = db
            .prepare<[string], { generation: number }>('SELECT generation FROM pruned_programs WHERE id = ?')
            .get(parentId);
        if (pruned) return pruned.generation;

        throw new NotFoundError(parentId, 'Parent program');
    }

    private getWithin(db: BetterSqlite3.Database, id: string): Program | null {
        const row = db.prepare<[string], ProgramRow>('SELECT * FROM programs WHERE id = ?').get(id);
        return row ? this.toProgram(row) : null;
    }

    /**
     * Strictly after every program ever stored in this file, pruned ones included,
     * so ordering holds across connections. Must run inside the write transaction.
     */
    private nextCreatedAt(db: BetterSqlite3.Database): number {
        const latest = db
            .prepare<[], { latest: number | null }>(`
                SELECT MAX(latest) AS latest FROM (
                    SELECT MAX(created_at) AS latest FROM programs
                    UNION ALL
                    SELECT MAX(created_at) AS latest FROM pruned_programs
                )
            `)
            .get();
        const last = latest?.latest ?? 0;
        return Math.max(Date.now(), last + 1);
    }

    private scope(conditions: string[], experiment?: string | null): { where: string; params: unknown[] } {
        const clauses = [...conditions];
        const params: unknown[] = [];
        if (experiment !== undefined && experiment !== null) {
            clauses.push('experiment = ?');
            params.push(experiment);
        }
        return { where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params };
    }

    private metricValues(metrics: FitnessMetrics | null): Array<number | null> {
        if (!metrics) {
            return [null, null, null, null, null, null, null, null, null];
        }
        return [
            metrics.sharpeRatio,
            metrics.calmarRatio,
            metrics.maxDrawdown,
            metrics.cagr,
            metrics.totalReturn,
            metrics.tradeCount ?? null,
            metrics.winRate ?? null,
            metrics.psr ?? null,
            metrics.netSharpe ?? null,
        ];
    }

    private toProgram(row: ProgramRow): Program {
        return {
            id: row.id,
            code: row.code,
            parentId: row.parent_id,
            generation: row.generation,
            experiment: row.experiment,
            createdAt: row.created_at,
            state: row.calmar === null
                ? { status: 'pending' }
                : { status: 'scored', metrics: this.toMetrics(row, row.calmar) },
        };
    }

    private toMetrics(row: ProgramRow, calmar: number): FitnessMetrics {
        const required = (column: MetricColumn, value: number | null): number => {
            if (value === null) {
                throw new StorageError('read', new Error(`Scored program ${row.id} has no ${column} value`));
            }
            return value;
        };

        const metrics: FitnessMetrics = {
            sharpeRatio: required('sharpe', row.sharpe),
            calmarRatio: calmar,
            maxDrawdown: required('max_dd', row.max_dd),
            cagr: required('cagr', row.cagr),
            totalReturn: required('total_return', row.total_return),
        };
        if (row.trade_count !== null) metrics.tradeCount = row.trade_count;
        if (row.win_rate !== null) metrics.winRate = row.win_rate;
        if (row.psr !== null) metrics.psr = row.psr;
        if (row.net_sharpe !== null) metrics.netSharpe = row.net_sharpe;
        return metrics;
    }

    /**
     * Run `fn` against an open connection. Domain errors pass through;
     * anything raised by the storage layer surfaces as StorageError.
     */
    private execute<T>(operation: string, fn: (db: BetterSqlite3.Database) => T): T {
        this.initialize();
        const db = this.db;
        if (!db) {
            throw new StorageError(operation, new Error('Database not initialized'));
        }

        try {
            return fn(db);
        } catch (error) {
            if (error instanceof EvolutionStoreError) throw error;
            logger.error(`[ProgramStore] ${operation} failed:`, error);
            throw new StorageError(operation, error);
        }
    }
}

function toRankedEntry(row: RankRow): RankedEntry {
    return { id: row.id, fitness: row.calmar, createdAt: row.created_at };
}

function parseStrategy(strategy: string): SelectionStrategy {
    const mode = SELECTION_STRATEGIES.find(s => s === strategy);
    if (!mode) {
        throw new InvalidArgumentError(
            `Unknown selection strategy "${strategy}". Expected one of: ${SELECTION_STRATEGIES.join(', ')}`
        );
    }
    return mode;
}

export default ProgramStore;
