import fs from 'fs/promises';

/** Headings the default template asks the model to produce, in order. */
export const SUMMARY_SECTIONS = [
    'TL;DR',
    'Code Patterns / Gotchas',
    'Things To Try',
    'Related Concepts',
    'Python Equivalents (if applicable)',
] as const;

export const PROMPT_SEPARATOR = '\n\n---\n\n';

export const DEFAULT_PROMPT_TEMPLATE = `You are a senior engineer reading a blog post or a raw developer discussion thread on behalf of a busy colleague.
Summarize it as Markdown with exactly these five sections, each introduced by a level-2 heading written as shown:

## ${SUMMARY_SECTIONS[0]}
Three to five sentences on what the piece is about and why it matters.

## ${SUMMARY_SECTIONS[1]}
The concrete techniques, idioms, APIs and pitfalls it describes, as bullet points. Include short code snippets where the source has them.

## ${SUMMARY_SECTIONS[2]}
Small, specific experiments a reader could run to try the ideas out.

## ${SUMMARY_SECTIONS[3]}
Neighbouring topics, tools or papers worth reading next, one line each.

## ${SUMMARY_SECTIONS[4]}
If the content is not about Python, show how the main ideas map onto Python. If there is nothing sensible to map, write "Not applicable."

Stick to what the content says. Do not invent APIs, versions or benchmark numbers.
The content to summarize follows the separator line.`;

/**
 * Builds the complete prompt: template instructions first, then the page
 * content verbatim after a horizontal-rule separator.
 */
export function buildPrompt(content: string, template: string = DEFAULT_PROMPT_TEMPLATE): string {
    return `${template.trimEnd()}${PROMPT_SEPARATOR}${content}`;
}

/**
 * Loads a custom prompt template from disk, or returns the built-in one when
 * no file is given. An empty template file is rejected.
 */
export async function loadPromptTemplate(file?: string): Promise<string> {
    if (!file) return DEFAULT_PROMPT_TEMPLATE;
    const template = await fs.readFile(file, 'utf-8');
    if (!template.trim()) {
        throw new Error(`Prompt template ${file} is empty`);
    }
    return template;
}
