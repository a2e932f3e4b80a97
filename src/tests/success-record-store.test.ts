import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PersistenceError } from '../lib/errors';
import { SuccessRecord } from '../models/Round';
import { InMemorySuccessRecordStore, JsonFileSuccessRecordStore } from '../persistence/successRecordStore';

const record: SuccessRecord = {
    demand: { AP1: 2, AP2: 2 },
    allocation: { AP1: [0, 1], AP2: [2, 3] },
    roundsToSuccess: 3,
    timestamp: '2024-01-01T00:00:00.000Z'
};

describe('JsonFileSuccessRecordStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'success-records-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('treats a missing file as an empty store', async () => {
        const store = new JsonFileSuccessRecordStore(path.join(dir, 'records.json'));

        expect(await store.load()).toEqual([]);
    });

    it('writes a pretty-printed array that a new store can load', async () => {
        const filePath = path.join(dir, 'nested', 'records.json');
        const store = new JsonFileSuccessRecordStore(filePath);

        await store.append(record);
        await store.append({ ...record, roundsToSuccess: 1 });

        const text = await fs.readFile(filePath, 'utf8');
        expect(text).toBe(JSON.stringify([record, { ...record, roundsToSuccess: 1 }], null, 2) + '\n');

        const reopened = new JsonFileSuccessRecordStore(filePath);
        expect((await reopened.load()).map(r => r.roundsToSuccess)).toEqual([3, 1]);
    });

    it('appends after previously stored records', async () => {
        const filePath = path.join(dir, 'records.json');
        await fs.writeFile(filePath, JSON.stringify([record]), 'utf8');
        const store = new JsonFileSuccessRecordStore(filePath);

        await store.load();
        await store.append({ ...record, roundsToSuccess: 7 });

        expect(store.list().map(r => r.roundsToSuccess)).toEqual([3, 7]);
    });

    it('refuses content that is not a record array', async () => {
        const notJson = path.join(dir, 'broken.json');
        const wrongShape = path.join(dir, 'shape.json');
        await fs.writeFile(notJson, '[{', 'utf8');
        await fs.writeFile(wrongShape, JSON.stringify({ records: [] }), 'utf8');

        await expect(new JsonFileSuccessRecordStore(notJson).load()).rejects.toBeInstanceOf(PersistenceError);
        await expect(new JsonFileSuccessRecordStore(wrongShape).load())
            .rejects.toThrow('Success record file does not hold a record array');
    });

    it('raises PersistenceError when the file cannot be written', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, 'not a directory', 'utf8');
        const store = new JsonFileSuccessRecordStore(path.join(blocker, 'records.json'));

        await expect(store.append(record)).rejects.toBeInstanceOf(PersistenceError);
        expect(store.list()).toEqual([record]);
    });
});

describe('InMemorySuccessRecordStore', () => {
    it('returns copies of its records', async () => {
        const store = new InMemorySuccessRecordStore([record]);

        store.list().pop();
        await store.append(record);

        expect(await store.load()).toHaveLength(2);
    });
});
