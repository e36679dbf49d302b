import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../models/errors';
import { DEFAULT_DIALOGUE_LABELS, DialogueLabels } from '../models/utils';
import { isRecord } from '../models/validation';

export const REQUIRED_MODULES = [
    'reaction_classifier',
    'resistance_detection',
    'memory_retrieve',
    'phase_selection',
    'strategy_selection',
    'counselor',
    'end_detection',
    'therapy_selection'
] as const;

export const OPTIONAL_MODULES = [
    'first_therapy_selection',
    'post_session_evaluation'
] as const;

export type RequiredModule = typeof REQUIRED_MODULES[number];
export type OptionalModule = typeof OPTIONAL_MODULES[number];
export type ModuleName = RequiredModule | OptionalModule;

export interface ModuleBinding {
    model: string;
    promptPath: string;
    template: string;
}

export type ModuleBindings = Record<RequiredModule, ModuleBinding> & Partial<Record<OptionalModule, ModuleBinding>>;

export interface ModelConfig {
    bindings: ModuleBindings;
    dialogueLabels: DialogueLabels;
}

const readBinding = (raw: unknown, moduleName: string, baseDir: string): ModuleBinding => {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`Module "${moduleName}" must be an object with "model" and "prompt_path"`);
    }

    const model = raw.model;
    const promptPath = raw.prompt_path;
    if (typeof model !== 'string' || !model.trim()) {
        throw new ConfigurationError(`Module "${moduleName}" is missing "model"`);
    }
    if (typeof promptPath !== 'string' || !promptPath.trim()) {
        throw new ConfigurationError(`Module "${moduleName}" is missing "prompt_path"`);
    }

    const resolvedPath = path.isAbsolute(promptPath) ? promptPath : path.resolve(baseDir, promptPath);
    let template: string;
    try {
        template = fs.readFileSync(resolvedPath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Prompt template for "${moduleName}" could not be read: ${resolvedPath}`, error);
    }
    if (!template.trim()) {
        throw new ConfigurationError(`Prompt template for "${moduleName}" is empty: ${resolvedPath}`);
    }

    return { model: model.trim(), promptPath: resolvedPath, template };
};

const readDialogueLabels = (raw: unknown): DialogueLabels => {
    if (raw === undefined) {
        return DEFAULT_DIALOGUE_LABELS;
    }
    if (!isRecord(raw)) {
        throw new ConfigurationError('"dialog_labels" must be an object');
    }
    const patient = raw.user_label;
    const counselor = raw.assistant_label;
    return {
        patient: typeof patient === 'string' && patient.trim() ? patient.trim() : DEFAULT_DIALOGUE_LABELS.patient,
        counselor: typeof counselor === 'string' && counselor.trim() ? counselor.trim() : DEFAULT_DIALOGUE_LABELS.counselor
    };
};

/**
 * Resolve every module binding from already-parsed configuration. Prompt
 * paths are relative to `baseDir`. Any missing binding is a startup error.
 */
export const parseModelConfig = (raw: unknown, baseDir: string): ModelConfig => {
    if (!isRecord(raw)) {
        throw new ConfigurationError('Model configuration must be a JSON object');
    }
    const source = raw;

    const bindRequired = (moduleName: RequiredModule): ModuleBinding => {
        if (!(moduleName in source)) {
            throw new ConfigurationError(`Model configuration is missing required module "${moduleName}"`);
        }
        return readBinding(source[moduleName], moduleName, baseDir);
    };

    const required: Record<RequiredModule, ModuleBinding> = {
        reaction_classifier: bindRequired('reaction_classifier'),
        resistance_detection: bindRequired('resistance_detection'),
        memory_retrieve: bindRequired('memory_retrieve'),
        phase_selection: bindRequired('phase_selection'),
        strategy_selection: bindRequired('strategy_selection'),
        counselor: bindRequired('counselor'),
        end_detection: bindRequired('end_detection'),
        therapy_selection: bindRequired('therapy_selection')
    };

    const optional: Partial<Record<OptionalModule, ModuleBinding>> = {};
    for (const moduleName of OPTIONAL_MODULES) {
        if (raw[moduleName] !== undefined) {
            optional[moduleName] = readBinding(raw[moduleName], moduleName, baseDir);
        }
    }

    return {
        bindings: { ...required, ...optional },
        dialogueLabels: readDialogueLabels(raw.dialog_labels)
    };
};

export const loadModelConfig = (configPath: string, baseDir: string = process.cwd()): ModelConfig => {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError(`Model configuration could not be read: ${configPath}`, error);
    }
    return parseModelConfig(raw, baseDir);
};

export const modelsByModule = (bindings: ModuleBindings): Record<string, string> => {
    const models: Record<string, string> = {};
    for (const [moduleName, binding] of Object.entries(bindings)) {
        if (binding) {
            models[moduleName] = binding.model;
        }
    }
    return models;
};
