import { ModelReactionClassifier } from './ModelReactionClassifier';
import { ModelResistanceDetector } from './ModelResistanceDetector';
import { ModelCounselorResponder } from './ModelCounselorResponder';
import { InvalidClassification, ModelFailure, ServiceError } from '../models/errors';
import { binding, ScriptedInvoker } from '../test-utils/scriptedSteps';
import { DialogueTurn } from '../types/DialogueTurn';
import { CounselorInput } from './types';

const at = new Date('2024-01-01T00:00:00.000Z');
const dialogue: DialogueTurn[] = [
    { role: 'patient', content: 'I feel on edge', timestamp: at }
];

describe('ModelBackedStep error mapping', () => {
    test('a timed-out service call becomes a timeout ModelFailure', async () => {
        const invoker = new ScriptedInvoker(new ServiceError('timed out', 'resistance_detection', undefined, true));
        const detector = new ModelResistanceDetector({ invoker, binding: binding('{patient_input}') });

        const failure = detector.detect({ utterance: 'hi', dialogue });

        await expect(failure).rejects.toBeInstanceOf(ModelFailure);
        await expect(failure).rejects.toMatchObject({ step: 'resistance_detection', reason: 'timeout', kind: 'model_failure' });
    });

    test('an HTTP failure becomes a service ModelFailure', async () => {
        const invoker = new ScriptedInvoker(new ServiceError('bad gateway', 'resistance_detection', 502));
        const detector = new ModelResistanceDetector({ invoker, binding: binding('{patient_input}') });

        await expect(detector.detect({ utterance: 'hi', dialogue })).rejects.toMatchObject({ reason: 'service', retryable: true });
    });

    test('blank output is an empty_output failure', async () => {
        const invoker = new ScriptedInvoker('   \n ');
        const detector = new ModelResistanceDetector({ invoker, binding: binding('{patient_input}') });

        await expect(detector.detect({ utterance: 'hi', dialogue })).rejects.toMatchObject({ reason: 'empty_output' });
    });

    test('a call that fails after the signal fired is reported as aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const invoker = new ScriptedInvoker(new Error('request cancelled'));
        const detector = new ModelResistanceDetector({ invoker, binding: binding('{patient_input}') });

        await expect(detector.detect({ utterance: 'hi', dialogue }, { signal: controller.signal }))
            .rejects.toMatchObject({ reason: 'aborted' });
    });

    test('forwards the signal and role to the invoker', async () => {
        const controller = new AbortController();
        const invoker = new ScriptedInvoker('false');
        const detector = new ModelResistanceDetector({ invoker, binding: binding('{patient_input}') });

        await detector.detect({ utterance: 'hi', dialogue }, { signal: controller.signal });

        expect(invoker.calls[0].role).toBe('resistance_detection');
        expect(invoker.calls[0].options?.signal).toBe(controller.signal);
    });

    test('exposes the bound model name', () => {
        const classifier = new ModelReactionClassifier({ invoker: new ScriptedInvoker(), binding: binding('x', 'openai/gpt-4o-mini') });
        expect(classifier.model).toBe('openai/gpt-4o-mini');
    });
});

describe('ModelReactionClassifier', () => {
    const classify = (reply: string) => {
        const invoker = new ScriptedInvoker(reply);
        const classifier = new ModelReactionClassifier({
            invoker,
            binding: binding('Session:\n{session_memory}\nInput: {patient_input}')
        });
        return { invoker, result: classifier.classify({ utterance: 'I feel on edge', dialogue }) };
    };

    test('reads emotion and intensity from fenced JSON', async () => {
        const { result } = classify('```json\n{"primary_emotion": "Anxiety", "emotional_intensity": 0.75}\n```');
        await expect(result).resolves.toEqual({ emotionLabel: 'anxiety', emotionIntensity: 0.75 });
    });

    test('accepts numeric strings and named levels for intensity', async () => {
        await expect(classify('{"primary_emotion": "fear", "emotional_intensity": "0.4"}').result)
            .resolves.toEqual({ emotionLabel: 'fear', emotionIntensity: 0.4 });
        await expect(classify('{"primary_emotion": "fear", "emotional_intensity": "high"}').result)
            .resolves.toEqual({ emotionLabel: 'fear', emotionIntensity: 0.9 });
    });

    test('renders the open dialogue with role labels', async () => {
        const { invoker, result } = classify('{"primary_emotion": "fear", "emotional_intensity": 0.5}');
        await result;
        expect(invoker.calls[0].prompt).toBe('Session:\nPatient: I feel on edge\nInput: I feel on edge');
    });

    test('rejects an emotion outside the label domain', async () => {
        const { result } = classify('{"primary_emotion": "melancholy", "emotional_intensity": 0.5}');
        await expect(result).rejects.toBeInstanceOf(InvalidClassification);
        await expect(result).rejects.toMatchObject({ kind: 'invalid_classification', step: 'reaction_classifier', reason: 'invalid_output' });
    });

    test('rejects intensity outside [0, 1]', async () => {
        await expect(classify('{"primary_emotion": "anger", "emotional_intensity": 7}').result)
            .rejects.toBeInstanceOf(InvalidClassification);
    });

    test('rejects output that is not JSON', async () => {
        await expect(classify('The patient seems anxious').result).rejects.toBeInstanceOf(InvalidClassification);
    });
});

describe('ModelResistanceDetector', () => {
    const detect = (reply: string) => {
        const detector = new ModelResistanceDetector({ invoker: new ScriptedInvoker(reply), binding: binding('{patient_input}') });
        return detector.detect({ utterance: 'whatever', dialogue });
    };

    test.each([
        ['true', true],
        ['False.', false],
        ['It is false that they comply, so true', true],
        ['true or false? I would say false', true]
    ])('reads %p as %p', async (reply, expected) => {
        await expect(detect(reply)).resolves.toBe(expected);
    });

    test('rejects an answer without true or false', async () => {
        await expect(detect('maybe')).rejects.toBeInstanceOf(InvalidClassification);
    });
});

describe('ModelCounselorResponder', () => {
    const input: CounselorInput = {
        utterance: 'I feel on edge',
        dialogue,
        memory: '',
        emotionLabel: 'anxiety',
        emotionIntensity: 0.7,
        therapy: 'Cognitive Behavioral Therapy (CBT)',
        phase: 'exploration',
        strategy: 'Reflection of Feelings',
        strategyText: 'Name the tension'
    };

    test('reads counselor_response from JSON', async () => {
        const responder = new ModelCounselorResponder({
            invoker: new ScriptedInvoker('{"counselor_response": "It sounds exhausting."}'),
            binding: binding('{current_strategy}: {patient_input}')
        });
        await expect(responder.respond(input)).resolves.toBe('It sounds exhausting.');
    });

    test('takes plain text as the reply', async () => {
        const invoker = new ScriptedInvoker('That sounds hard to carry.');
        const responder = new ModelCounselorResponder({ invoker, binding: binding('{current_strategy} / {current_strategy_text}') });

        await expect(responder.respond(input)).resolves.toBe('That sounds hard to carry.');
        expect(invoker.calls[0].prompt).toBe('Reflection of Feelings / Name the tension\n\nPatient input: I feel on edge');
    });

    test('fails on JSON without a response field', async () => {
        const responder = new ModelCounselorResponder({ invoker: new ScriptedInvoker('{"note": "x"}'), binding: binding('{patient_input}') });
        await expect(responder.respond(input)).rejects.toMatchObject({ reason: 'empty_output' });
    });
});
