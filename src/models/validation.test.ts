import fc from 'fast-check';
import { RecordValidationError } from './errors';
import { createEmptySession } from './utils';
import { deserializeRecord, matchLabel, serializeState } from './validation';
import { EMOTION_LABELS, PHASE_LABELS, STRATEGY_LABELS } from '../types/Labels';
import { CounselingState } from '../types/CounselingState';
import { SessionRecord } from '../types/SessionRecord';

const T0 = new Date('2024-03-10T08:30:00.000Z');

const baseRecord = () => ({
    record_id: 'counseling_20240310_083000_abcd1234',
    current_therapy: 'Cognitive Behavioral Therapy (CBT)',
    created_at: T0.toISOString(),
    last_updated: T0.toISOString(),
    all_sessions: [
        {
            index: 1,
            therapy: 'Cognitive Behavioral Therapy (CBT)',
            therapy_reason: '',
            dialogue: [{ role: 'patient', content: 'Hello', timestamp: T0.toISOString() }],
            is_ended: false,
            phase_history: ['assessment'],
            turn_analyses: [],
            created_at: T0.toISOString()
        }
    ]
});

const dateArb = fc.integer({ min: 0, max: 4102444800000 }).map(ms => new Date(ms));

const sessionFieldsArb = fc.record({
    therapy: fc.string({ minLength: 1 }),
    therapyReason: fc.string(),
    dialogue: fc.array(fc.record({
        role: fc.constantFrom<'patient' | 'counselor'>('patient', 'counselor'),
        content: fc.string(),
        timestamp: dateArb
    }), { maxLength: 4 }),
    phaseHistory: fc.array(fc.constantFrom(...PHASE_LABELS), { maxLength: 4 }),
    turnAnalyses: fc.array(fc.record({
        turn: fc.nat(50),
        emotionLabel: fc.constantFrom(...EMOTION_LABELS),
        emotionIntensity: fc.double({ min: 0, max: 1, noNaN: true }),
        resistance: fc.boolean(),
        phase: fc.constantFrom(...PHASE_LABELS),
        retrievedMemory: fc.string(),
        strategy: fc.constantFrom(...STRATEGY_LABELS),
        strategyText: fc.string(),
        models: fc.dictionary(fc.constantFrom('counselor', 'reaction_classifier'), fc.string({ minLength: 1 }))
    }), { maxLength: 3 }),
    createdAt: dateArb,
    endedAt: dateArb
});

// Every session but the last is closed, indexes count up from 1
const stateArb: fc.Arbitrary<CounselingState> = fc.record({
    recordId: fc.stringMatching(/^[A-Za-z0-9_-]{1,20}$/),
    currentTherapy: fc.string({ minLength: 1 }),
    createdAt: dateArb,
    updatedAt: dateArb,
    sessions: fc.array(sessionFieldsArb, { minLength: 1, maxLength: 4 })
}).map(({ sessions, ...record }) => ({
    ...record,
    allSessions: sessions.map(({ endedAt, ...fields }, position): SessionRecord => {
        const isEnded = position < sessions.length - 1;
        return { index: position + 1, isEnded, ...fields, ...(isEnded ? { endedAt } : {}) };
    })
}));

const invalidRecords: Array<[string, () => unknown, string]> = [
    ['a non-object record', () => 'not a record', 'record must be an object'],
    ['a bad record id', () => ({ ...baseRecord(), record_id: '../escape' }), 'record.record_id'],
    ['a missing therapy', () => {
        const { current_therapy: _omitted, ...rest } = baseRecord();
        return rest;
    }, 'record.current_therapy must be a string'],
    ['a bad timestamp', () => ({ ...baseRecord(), last_updated: 'yesterday' }), 'record.last_updated must be an ISO-8601 timestamp'],
    ['an unknown role', () => {
        const record = baseRecord();
        return { ...record, all_sessions: [{ ...record.all_sessions[0], dialogue: [{ role: 'system', content: 'x', timestamp: T0.toISOString() }] }] };
    }, 'record.all_sessions[0].dialogue[0].role'],
    ['an unknown phase', () => {
        const record = baseRecord();
        return { ...record, all_sessions: [{ ...record.all_sessions[0], phase_history: ['warmup'] }] };
    }, 'record.all_sessions[0].phase_history[0]']
];

describe('record validation', () => {
    describe('matchLabel', () => {
        test('ignores case, quotes and trailing punctuation', () => {
            expect(matchLabel(STRATEGY_LABELS, '"reflection of feelings."')).toBe('Reflection of Feelings');
            expect(matchLabel(PHASE_LABELS, '  Intervention ')).toBe('intervention');
        });

        test('returns undefined for text outside the domain', () => {
            expect(matchLabel(EMOTION_LABELS, 'melancholy')).toBeUndefined();
        });
    });

    /**
     * Property 3: Persisted records round-trip
     * Validates: serialization keeps every field of the in-memory state
     */
    test('Property 3: Persisted records round-trip', () => {
        fc.assert(fc.property(stateArb, state => {
            const document = JSON.parse(JSON.stringify(serializeState(state)));
            expect(deserializeRecord(document)).toEqual(state);
        }), { numRuns: 50 });
    });

    test('writes snake_case keys at the top level', () => {
        const state = deserializeRecord(baseRecord());
        expect(Object.keys(serializeState(state))).toEqual([
            'record_id',
            'current_therapy',
            'created_at',
            'last_updated',
            'all_sessions'
        ]);
    });

    test('omits ended_at and evaluation on an open session', () => {
        const state: CounselingState = {
            recordId: 'record-1',
            currentTherapy: 'CBT',
            createdAt: T0,
            updatedAt: T0,
            allSessions: [createEmptySession(1, 'CBT', '', T0)]
        };

        const [session] = serializeState(state).all_sessions;

        expect(session).not.toHaveProperty('ended_at');
        expect(session).not.toHaveProperty('evaluation');
    });

    test.each(invalidRecords)('rejects %s', (_name, build, message) => {
        expect(() => deserializeRecord(build())).toThrow(RecordValidationError);
        expect(() => deserializeRecord(build())).toThrow(message);
    });

    test('rejects an open session before the last one', () => {
        const record = baseRecord();
        const open = record.all_sessions[0];
        const invalid = { ...record, all_sessions: [open, { ...open, index: 2 }] };

        expect(() => deserializeRecord(invalid)).toThrow('record.all_sessions[0].is_ended must be true for every session but the last');
    });

    test('rejects gaps in session indexes', () => {
        const record = baseRecord();
        const closed = { ...record.all_sessions[0], is_ended: true };
        const invalid = { ...record, all_sessions: [closed, { ...record.all_sessions[0], index: 3 }] };

        expect(() => deserializeRecord(invalid)).toThrow('record.all_sessions[1].index must be consecutive');
    });

    test('rejects ended_at on an open session', () => {
        const record = baseRecord();
        const invalid = { ...record, all_sessions: [{ ...record.all_sessions[0], ended_at: T0.toISOString() }] };

        expect(() => deserializeRecord(invalid)).toThrow('absent while the session is open');
    });
});
