// src/persistence/successRecordStore.ts

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { errorMessage, PersistenceError } from '../lib/errors';
import { SuccessRecord } from '../models/Round';

/**
 * Append-only, ordered collection of success records
 *
 * Loaded in full at start, rewritten in full on each append.
 * Last writer wins across processes.
 */
export interface SuccessRecordStore {
    load(): Promise<SuccessRecord[]>;
    append(record: SuccessRecord): Promise<void>;
    list(): SuccessRecord[];
}

const SuccessRecordSchema = z.object({
    demand: z.record(z.number().int()),
    allocation: z.record(z.array(z.number().int())),
    roundsToSuccess: z.number().int().min(1),
    timestamp: z.string()
});

const SuccessRecordFileSchema = z.array(SuccessRecordSchema);

export class InMemorySuccessRecordStore implements SuccessRecordStore {
    private records: SuccessRecord[];

    constructor(initial: SuccessRecord[] = []) {
        this.records = [...initial];
    }

    async load(): Promise<SuccessRecord[]> {
        return this.list();
    }

    async append(record: SuccessRecord): Promise<void> {
        this.records.push(record);
    }

    list(): SuccessRecord[] {
        return [...this.records];
    }
}

/**
 * Success records in a pretty-printed JSON array file
 *
 * A missing file is an empty store. Content that is not a valid record
 * array raises PersistenceError rather than being overwritten.
 */
export class JsonFileSuccessRecordStore implements SuccessRecordStore {
    private filePath: string;
    private records: SuccessRecord[] = [];

    constructor(filePath: string) {
        this.filePath = path.resolve(filePath);
    }

    async load(): Promise<SuccessRecord[]> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf8');
        } catch (err) {
            if (isMissingFile(err)) {
                this.records = [];
                return [];
            }
            throw new PersistenceError(`Cannot read success records: ${errorMessage(err)}`, this.filePath);
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (err) {
            throw new PersistenceError(`Success record file is not JSON: ${errorMessage(err)}`, this.filePath);
        }

        const parsed = SuccessRecordFileSchema.safeParse(data);
        if (!parsed.success) {
            throw new PersistenceError('Success record file does not hold a record array', this.filePath);
        }

        this.records = parsed.data;
        return this.list();
    }

    /**
     * Append and rewrite the whole file
     * On write failure the in-memory list keeps the record; the next
     * successful append writes it out.
     */
    async append(record: SuccessRecord): Promise<void> {
        this.records.push(record);
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(this.filePath, JSON.stringify(this.records, null, 2) + '\n', 'utf8');
        } catch (err) {
            throw new PersistenceError(`Cannot write success records: ${errorMessage(err)}`, this.filePath);
        }
    }

    list(): SuccessRecord[] {
        return [...this.records];
    }
}

function isMissingFile(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
