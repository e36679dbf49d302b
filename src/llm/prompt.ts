export type PromptVariables = Record<string, string>;

/**
 * Substitute `{name}` placeholders for the given variables. Braces that do not
 * name a variable are left alone, so templates may carry JSON examples.
 */
export const renderPrompt = (template: string, variables: PromptVariables, appendWhenMissing?: string): string => {
    let rendered = template;
    for (const [name, value] of Object.entries(variables)) {
        rendered = rendered.split(`{${name}}`).join(value);
    }

    if (appendWhenMissing && !template.includes(`{${appendWhenMissing}}`)) {
        const value = variables[appendWhenMissing];
        if (value !== undefined) {
            rendered = `${rendered}\n\nPatient input: ${value}`;
        }
    }

    return rendered;
};
