import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { InvalidInputError, RecordNotFoundError, RecordValidationError } from '../models/errors';
import { isValidRecordId } from '../models/utils';
import { deserializeRecord, serializeState } from '../models/validation';
import { CounselingState, RecordSummary } from '../types/CounselingState';
import { errorMeta, logger } from '../utils/logger';
import { byMostRecent, RecordStore, summarize } from './RecordStore';

const log = logger.child('file-store');

const isMissingFile = (error: unknown): boolean => {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
};

/**
 * One pretty-printed JSON file per record. Writes go to a temporary file in
 * the same directory and are renamed over the target.
 */
export class FileRecordStore implements RecordStore {
    constructor(private readonly directory: string) {}

    async save(state: CounselingState): Promise<void> {
        const target = this.pathFor(state.recordId);
        const temporary = `${target}.${uuidv4()}.tmp`;
        const body = `${JSON.stringify(serializeState(state), null, 2)}\n`;

        await fs.mkdir(this.directory, { recursive: true });
        try {
            await fs.writeFile(temporary, body, 'utf-8');
            await fs.rename(temporary, target);
        } catch (error) {
            try {
                await fs.rm(temporary, { force: true });
            } catch (cleanupError) {
                log.warn('Could not remove temporary record file', { file: temporary, ...errorMeta(cleanupError) });
            }
            throw error;
        }

        log.debug('Record written', { recordId: state.recordId, bytes: body.length });
    }

    async load(recordId: string): Promise<CounselingState> {
        let content: string;
        try {
            content = await fs.readFile(this.pathFor(recordId), 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                throw new RecordNotFoundError(recordId);
            }
            throw error;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            throw new RecordValidationError(`Counseling record ${recordId} is not valid JSON`, error);
        }

        const state = deserializeRecord(raw);
        if (state.recordId !== recordId) {
            throw new RecordValidationError(`Counseling record file ${recordId} holds record ${state.recordId}`);
        }
        return state;
    }

    async list(): Promise<RecordSummary[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(this.directory);
        } catch (error) {
            if (isMissingFile(error)) {
                return [];
            }
            throw error;
        }

        const summaries: RecordSummary[] = [];
        for (const entry of entries) {
            if (!entry.endsWith('.json')) {
                continue;
            }
            const recordId = entry.slice(0, -'.json'.length);
            if (!isValidRecordId(recordId)) {
                continue;
            }
            try {
                summaries.push(summarize(await this.load(recordId)));
            } catch (error) {
                log.warn('Skipping unreadable record', { recordId, ...errorMeta(error) });
            }
        }

        return summaries.sort(byMostRecent);
    }

    private pathFor(recordId: string): string {
        if (!isValidRecordId(recordId)) {
            throw new InvalidInputError(`Invalid record id: ${recordId}`);
        }
        return path.join(this.directory, `${recordId}.json`);
    }
}
