/**
 * LaTeX document assembler.
 *
 * A narrative that is already a full document is used as the base;
 * otherwise one is built from the sections. Charts are appended under a
 * "Visual Analysis" heading before `\end{document}`.
 */

import { access, mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import { ReportError } from '../lib/errors';
import type { CommandRunner, DocumentAssembler, DocumentRequest } from './collaborators';
import { runCommand } from './process';
import { cleanContent, escapeLatex, looksLikeLatex, repairItemize } from './text';

export interface LatexAssemblerOptions {
    /** Output directory (default: 'output') */
    outputDir?: string;
    /** Base name of the output files (default: 'report') */
    fileName?: string;
    /** LaTeX compiler; `null` writes the .tex file only (default: 'pdflatex') */
    compiler?: string | null;
    /** Compiler passes (default: 2) */
    passes?: number;
    runCommand?: CommandRunner;
    logger?: Logger;
}

const VISUAL_HEADING = '\\section*{Visual Analysis}';
const END_DOCUMENT = '\\end{document}';

/** Section order in generated documents; other sections follow by name */
const SECTION_ORDER = ['narrative', 'kpis', 'stats'];

export function createLatexAssembler(options: LatexAssemblerOptions = {}): DocumentAssembler {
    const outputDir = path.resolve(options.outputDir ?? 'output');
    const fileName = options.fileName ?? 'report';
    const compiler = options.compiler === undefined ? 'pdflatex' : options.compiler;
    const passes = options.passes ?? 2;
    const run = options.runCommand ?? runCommand;
    const logger = options.logger ?? noopLogger;

    return {
        async assemble(request: DocumentRequest): Promise<string> {
            const charts: string[] = [];
            for (const artifact of request.artifacts) {
                if (await exists(artifact)) {
                    charts.push(artifact);
                } else {
                    logger.warn('Chart file not found, skipping', { path: artifact });
                }
            }

            const latex = renderDocument(request.title, request.sections, charts);
            const texPath = path.join(outputDir, `${fileName}.tex`);
            await mkdir(outputDir, { recursive: true });
            await writeFile(texPath, latex, 'utf8');

            if (compiler === null) {
                return texPath;
            }

            for (let pass = 1; pass <= passes; pass++) {
                const result = await run(
                    compiler,
                    ['-interaction=nonstopmode', `-output-directory=${outputDir}`, texPath],
                    { cwd: outputDir }
                );
                if (result.code !== 0) {
                    throw new ReportError(
                        `${compiler} exited with code ${result.code} on pass ${pass}: ${result.stdout.slice(-500)}`
                    );
                }
            }

            const pdfPath = path.join(outputDir, `${fileName}.pdf`);
            logger.info('Document assembled', { path: pdfPath });
            return pdfPath;
        },
    };
}

/**
 * Full LaTeX source for a report.
 */
export function renderDocument(title: string, sections: Record<string, string>, charts: string[]): string {
    const narrative = sections.narrative ?? '';
    let latex = narrative.includes('\\documentclass') ? narrative : buildDocument(title, sections);

    if (charts.length === 0) {
        return latex.includes(END_DOCUMENT) ? latex : `${latex}\n${END_DOCUMENT}`;
    }

    let figures = latex.includes(VISUAL_HEADING) ? '' : `\n${VISUAL_HEADING}\n`;
    for (const chart of charts) {
        const file = path.resolve(chart).split(path.sep).join('/');
        figures += `\\begin{figure}[h!]\\centering\\includegraphics[width=0.8\\textwidth]{${file}}\\end{figure}\n`;
    }

    if (latex.includes(END_DOCUMENT)) {
        latex = latex.replace(END_DOCUMENT, () => `${figures}${END_DOCUMENT}`);
    } else {
        latex += `\n${figures}${END_DOCUMENT}`;
    }
    return latex;
}

function buildDocument(title: string, sections: Record<string, string>): string {
    const names = Object.keys(sections).sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
    const body = names
        .filter(name => sections[name].trim() !== '')
        .map(name => sectionBlock(name, sections[name]));

    return [
        '\\documentclass[11pt]{article}',
        '\\usepackage{graphicx}',
        '\\usepackage{geometry}',
        '\\usepackage{booktabs}',
        '\\geometry{margin=1in, top=0.5in}',
        `\\title{${escapeLatex(title)}}`,
        '\\date{\\today}',
        '\\begin{document}',
        '\\maketitle',
        ...body,
        END_DOCUMENT,
    ].join('\n');
}

function rank(name: string): number {
    const index = SECTION_ORDER.indexOf(name);
    return index === -1 ? SECTION_ORDER.length : index;
}

function sectionBlock(name: string, content: string): string {
    if (looksLikeLatex(content)) {
        return repairItemize(content).text;
    }
    const heading = name.charAt(0).toUpperCase() + name.slice(1);
    return `\\section*{${escapeLatex(heading)}}\n${escapeLatex(cleanContent(content))}`;
}

async function exists(file: string): Promise<boolean> {
    try {
        await access(file);
        return true;
    } catch {
        return false;
    }
}
