import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileRecordStore } from './FileRecordStore';
import { InvalidInputError, RecordNotFoundError, RecordValidationError } from '../models/errors';
import { createEmptySession } from '../models/utils';
import { serializeState } from '../models/validation';
import { CounselingState } from '../types/CounselingState';

const stateFor = (recordId: string, updatedAt: Date): CounselingState => ({
    recordId,
    currentTherapy: 'Cognitive Behavioral Therapy (CBT)',
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    updatedAt,
    allSessions: [
        {
            ...createEmptySession(1, 'Cognitive Behavioral Therapy (CBT)', '', updatedAt),
            dialogue: [{ role: 'patient', content: 'Work has been overwhelming', timestamp: updatedAt }]
        }
    ]
});

describe('FileRecordStore', () => {
    let directory: string;
    let store: FileRecordStore;

    beforeEach(async () => {
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'records-'));
        store = new FileRecordStore(path.join(directory, 'records'));
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(directory, { recursive: true, force: true });
    });

    test('saves a record and loads it back', async () => {
        const state = stateFor('record-a', new Date('2024-01-02T00:00:00.000Z'));

        await store.save(state);

        await expect(store.load('record-a')).resolves.toEqual(state);
    });

    test('writes pretty-printed JSON and leaves no temporary files', async () => {
        const state = stateFor('record-a', new Date('2024-01-02T00:00:00.000Z'));

        await store.save(state);

        const files = await fs.readdir(path.join(directory, 'records'));
        const content = await fs.readFile(path.join(directory, 'records', 'record-a.json'), 'utf-8');
        expect(files).toEqual(['record-a.json']);
        expect(content).toBe(`${JSON.stringify(serializeState(state), null, 2)}\n`);
    });

    test('overwrites the previous version', async () => {
        await store.save(stateFor('record-a', new Date('2024-01-02T00:00:00.000Z')));
        const newer = { ...stateFor('record-a', new Date('2024-01-03T00:00:00.000Z')), currentTherapy: 'ACT' };

        await store.save(newer);

        await expect(store.load('record-a')).resolves.toMatchObject({ currentTherapy: 'ACT' });
    });

    test('a failed rename surfaces even when cleanup also fails', async () => {
        jest.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('rename failed'));
        jest.spyOn(fs, 'rm').mockRejectedValueOnce(new Error('rm failed'));

        await expect(store.save(stateFor('record-a', new Date('2024-01-02T00:00:00.000Z')))).rejects.toThrow('rename failed');
        expect(fs.rm).toHaveBeenCalledTimes(1);
    });

    test('reports a missing record', async () => {
        await expect(store.load('record-missing')).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    test('rejects ids that could leave the directory', async () => {
        await expect(store.load('../outside')).rejects.toBeInstanceOf(InvalidInputError);
    });

    test('rejects a file that is not JSON', async () => {
        await fs.mkdir(path.join(directory, 'records'));
        await fs.writeFile(path.join(directory, 'records', 'record-bad.json'), 'not json');

        await expect(store.load('record-bad')).rejects.toBeInstanceOf(RecordValidationError);
    });

    test('rejects a file holding a different record', async () => {
        await store.save(stateFor('record-a', new Date('2024-01-02T00:00:00.000Z')));
        await fs.copyFile(path.join(directory, 'records', 'record-a.json'), path.join(directory, 'records', 'record-b.json'));

        await expect(store.load('record-b')).rejects.toThrow('Counseling record file record-b holds record record-a');
    });

    test('lists records newest first and skips unreadable files', async () => {
        await store.save(stateFor('record-old', new Date('2024-01-02T00:00:00.000Z')));
        await store.save(stateFor('record-new', new Date('2024-02-02T00:00:00.000Z')));
        await fs.writeFile(path.join(directory, 'records', 'record-bad.json'), '{}');
        await fs.writeFile(path.join(directory, 'records', 'notes.txt'), 'ignored');

        const summaries = await store.list();

        expect(summaries.map(summary => summary.recordId)).toEqual(['record-new', 'record-old']);
        expect(summaries[0]).toEqual({
            recordId: 'record-new',
            currentTherapy: 'Cognitive Behavioral Therapy (CBT)',
            sessionCount: 1,
            lastUpdated: new Date('2024-02-02T00:00:00.000Z')
        });
    });

    test('lists nothing before the directory exists', async () => {
        await expect(store.list()).resolves.toEqual([]);
    });
});
