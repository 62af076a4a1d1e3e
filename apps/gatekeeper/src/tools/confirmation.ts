import type { ToolDescriptor } from '../nlp/router.js';

/** Asks the owner a yes/no question and resolves with whatever they answered. */
export type ConfirmationPrompt = (question: string, tool: Readonly<ToolDescriptor>) => Promise<string>;

const AFFIRMATIVE: ReadonlySet<string> = new Set(['yes', 'y']);

export function confirmationQuestion(toolName: string): string {
    const [family, ...rest] = toolName.split('.');
    if (rest.length === 0) {
        return `Do you want to run ${toolName}? (yes/no)`;
    }
    return `Do you want to ${rest.join(' ')} using ${family}? (yes/no)`;
}

export function isAffirmative(answer: string): boolean {
    return AFFIRMATIVE.has(answer.trim().toLowerCase());
}
