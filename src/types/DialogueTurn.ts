export type DialogueRole = 'patient' | 'counselor';

export interface DialogueTurn {
    readonly role: DialogueRole;
    readonly content: string;
    readonly timestamp: Date;
    readonly model?: string; // model that produced a counselor turn
}
