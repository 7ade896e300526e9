/**
 * Summary section splitter
 *
 * Splits a Markdown summary into heading-based sections. Each section carries
 * the full heading breadcrumb path, which lets the batch runner check that
 * the model answered with every section the prompt asked for.
 *
 * Example input:
 *   ## TL;DR
 *   A short overview.
 *   ## Things To Try
 *   - Run the benchmark
 *
 * Produces 2 sections:
 *   { heading_path: ["TL;DR"], content: "A short overview." }
 *   { heading_path: ["Things To Try"], content: "- Run the benchmark" }
 */

import { SUMMARY_SECTIONS } from './prompt.js';

export interface Section {
    /** Full breadcrumb path from the document root, e.g. ["Summary", "TL;DR"] */
    heading_path: string[];
    /** The markdown content of this section (excluding the heading line itself) */
    content: string;
}

const FENCE = /^\s*(```|~~~)/;

/**
 * Splits markdown into sections based on ATX-style headings (# ## ###).
 * Content before any heading is collected under an empty heading_path; '#'
 * lines inside fenced code blocks are content, not headings. Whitespace-only
 * preamble is dropped, but a heading with an empty body still yields a section.
 */
export function splitSections(markdown: string): Section[] {
    const lines = markdown.split('\n');
    const sections: Section[] = [];

    // Open headings from outermost to innermost; levels may skip (## without #)
    const headingStack: Array<{ level: number; title: string }> = [];

    let currentContent: string[] = [];
    let inFence = false;

    function flush() {
        const text = currentContent.join('\n').trim();
        if (headingStack.length > 0 || text.length > 0) {
            sections.push({
                heading_path: headingStack.map(h => h.title),
                content: text,
            });
        }
        currentContent = [];
    }

    for (const line of lines) {
        if (FENCE.test(line)) inFence = !inFence;

        const headingMatch = inFence ? null : line.match(/^(#{1,6})\s+(.+)$/);
        if (headingMatch) {
            flush();
            const level = headingMatch[1].length; // 1 = H1, 2 = H2, …
            const title = stripInlineMarkdown(headingMatch[2]);

            // Close every open heading at the same or a deeper level
            while (headingStack.length > 0 && headingStack[headingStack.length - 1].level >= level) {
                headingStack.pop();
            }
            headingStack.push({ level, title });
        } else {
            currentContent.push(line);
        }
    }

    flush();
    return sections;
}

/**
 * Returns the expected section names that have no matching heading.
 * A heading matches when it contains the section's key words, case-insensitively:
 * the name up to its first " / " or " (" ("Code Patterns", "Python Equivalents").
 */
export function findMissingSections(
    markdown: string,
    expected: readonly string[] = SUMMARY_SECTIONS,
): string[] {
    const headings = splitSections(markdown)
        .map(s => s.heading_path[s.heading_path.length - 1])
        .filter((h): h is string => h !== undefined)
        .map(h => h.toLowerCase());

    return expected.filter(name => {
        const key = sectionKey(name);
        return !headings.some(h => h.includes(key));
    });
}

function sectionKey(name: string): string {
    return name.split(/ \/ | \(/)[0].trim().toLowerCase();
}

function stripInlineMarkdown(heading: string): string {
    return heading.trim()
        // Strip inline markdown: **bold**, _italic_, `code`, [text](url), trailing #'s
        .replace(/\s+#+\s*$/, '')
        .replace(/\*\*(.+?)\*\*/g, '$1')
        .replace(/\*(.+?)\*/g, '$1')
        .replace(/_(.+?)_/g, '$1')
        .replace(/`(.+?)`/g, '$1')
        .replace(/\[(.+?)\]\(.+?\)/g, '$1')
        .trim();
}
