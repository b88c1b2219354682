import { describe, it, expect } from 'vitest';
import { cleanContent, escapeLatex, extractCode, looksLikeLatex, repairItemize } from '../../../src/report/text';

describe('report text helpers', () => {
    describe('cleanContent', () => {
        it('should strip markdown emphasis and headings', () => {
            expect(cleanContent('## Summary\n**Revenue** grew *fast*')).toBe('Summary\nRevenue grew fast');
        });

        it('should replace insert placeholders', () => {
            expect(cleanContent('Top region: [insert region name]')).toBe('Top region: N/A');
        });

        it('should flatten objects into title-cased lines', () => {
            expect(cleanContent({ total_sales: 1200, top_region: 'North' })).toBe('Total Sales: 1200\nTop Region: North');
        });

        it('should flatten arrays into bullet lines', () => {
            expect(cleanContent(['mean 4.2', 'median 4'])).toBe('- mean 4.2\n- median 4');
        });

        it('should unwrap JSON text', () => {
            expect(cleanContent('  {"avg_price": "12.5", "notes": ["stable"]}  ')).toBe('Avg Price: 12.5\nNotes: - stable');
        });

        it('should keep text that only looks like JSON', () => {
            expect(cleanContent('{not json}')).toBe('{not json}');
        });

        it('should render missing values as empty text', () => {
            expect(cleanContent(undefined)).toBe('');
            expect(cleanContent(null)).toBe('');
        });
    });

    describe('extractCode', () => {
        it('should return the first python block', () => {
            const text = 'Here is the script:\n```python\nprint("PATH: a.png")\n```\nDone.';

            expect(extractCode(text)).toBe('print("PATH: a.png")\n');
        });

        it('should return the text when no block exists', () => {
            expect(extractCode('print(1)')).toBe('print(1)');
        });
    });

    describe('escapeLatex', () => {
        it('should escape control characters', () => {
            expect(escapeLatex('50% & $5 #1 unit_price')).toBe('50\\% \\& \\$5 \\#1 unit\\_price');
        });
    });

    describe('repairItemize', () => {
        it('should close unbalanced itemize blocks', () => {
            const result = repairItemize('\\begin{itemize}\\item a\\begin{itemize}\\item b\\end{itemize}');

            expect(result.added).toBe(1);
            expect(result.text).toBe('\\begin{itemize}\\item a\\begin{itemize}\\item b\\end{itemize}\\end{itemize}');
        });

        it('should leave balanced text alone', () => {
            const text = '\\begin{itemize}\\item a\\end{itemize}';

            expect(repairItemize(text)).toEqual({ text, added: 0 });
        });
    });

    describe('looksLikeLatex', () => {
        it('should detect LaTeX commands', () => {
            expect(looksLikeLatex('\\section{Findings}')).toBe(true);
            expect(looksLikeLatex('Plain findings')).toBe(false);
        });
    });
});
