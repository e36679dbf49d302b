import { ModelMemoryRetriever, truncateMemory } from './ModelMemoryRetriever';
import { ModelEndOfSessionDetector } from './ModelEndOfSessionDetector';
import { createEmptySession } from '../models/utils';
import { binding, ScriptedInvoker } from '../test-utils/scriptedSteps';
import { SessionRecord } from '../types/SessionRecord';
import { DialogueTurn } from '../types/DialogueTurn';

const at = new Date('2024-02-02T12:00:00.000Z');

const closedSession: SessionRecord = {
    ...createEmptySession(1, 'CBT', '', at),
    isEnded: true,
    endedAt: at,
    dialogue: [
        { role: 'patient', content: 'I lost my job', timestamp: at },
        { role: 'counselor', content: 'That is a big change', timestamp: at }
    ]
};

describe('ModelMemoryRetriever', () => {
    const retriever = (invoker: ScriptedInvoker, maxChars = 2000) =>
        new ModelMemoryRetriever({ invoker, binding: binding('{all_dialogs}|{patient_input}'), maxChars });

    test('skips the model when no closed session has dialogue', async () => {
        const invoker = new ScriptedInvoker();
        const openSession: SessionRecord = { ...closedSession, index: 2, isEnded: false, endedAt: undefined };

        await expect(retriever(invoker).retrieve({ utterance: 'hi', closedSessions: [openSession] })).resolves.toBe('');
        expect(invoker.calls).toHaveLength(0);
    });

    test('renders closed sessions as labelled history', async () => {
        const invoker = new ScriptedInvoker('They recently lost their job.');

        await expect(retriever(invoker).retrieve({ utterance: 'how do I cope', closedSessions: [closedSession] }))
            .resolves.toBe('They recently lost their job.');
        expect(invoker.calls[0].prompt).toBe('Session 1:\nPatient: I lost my job\nTherapist: That is a big change|how do I cope');
    });

    test.each(['None.', 'n/a', 'No need to consider earlier sessions'])('treats %p as no memory', async reply => {
        await expect(retriever(new ScriptedInvoker(reply)).retrieve({ utterance: 'hi', closedSessions: [closedSession] })).resolves.toBe('');
    });

    test('truncates long memory to the configured length', async () => {
        const invoker = new ScriptedInvoker('The patient lost their job last week');
        await expect(retriever(invoker, 11).retrieve({ utterance: 'hi', closedSessions: [closedSession] })).resolves.toBe('The patient');
    });

    test('does not split an emoji at the cut', async () => {
        const invoker = new ScriptedInvoker('ok \u{1F600} then more');

        await expect(retriever(invoker, 4).retrieve({ utterance: 'hi', closedSessions: [closedSession] })).resolves.toBe('ok ');
    });

    test('truncateMemory keeps a pair that fits whole', () => {
        expect(truncateMemory('ok \u{1F600} then', 5)).toBe('ok \u{1F600}');
        expect(truncateMemory('short', 10)).toBe('short');
    });
});

describe('ModelEndOfSessionDetector', () => {
    const dialogue: DialogueTurn[] = [
        { role: 'patient', content: 'Thanks, that is all for today', timestamp: at },
        { role: 'counselor', content: 'Take care until next time', timestamp: at }
    ];

    test('asks about the last patient turn with the whole session as context', async () => {
        const invoker = new ScriptedInvoker('true');
        const detector = new ModelEndOfSessionDetector({ invoker, binding: binding('{session_memory}\n>> {patient_input}') });

        await expect(detector.detect({ dialogue })).resolves.toBe(true);
        expect(invoker.calls[0].prompt).toBe('Patient: Thanks, that is all for today\nTherapist: Take care until next time\n>> Thanks, that is all for today');
    });

    test('follows the final answer word', async () => {
        const detector = new ModelEndOfSessionDetector({
            invoker: new ScriptedInvoker('It might look true, but the answer is false'),
            binding: binding('{session_memory}')
        });

        await expect(detector.detect({ dialogue })).resolves.toBe(false);
    });
});
