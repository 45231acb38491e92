// ─────────────────────────────────────────────────────────────
// Equata  ·  Toolbar Templates
// Each template is a short markup fragment, validated and parsed
// once at registration. Inserting one copies nothing: trees are
// immutable, so the parsed subtree is shared safely.
// ─────────────────────────────────────────────────────────────

import type { ExprNode } from '../core/ast';
import { describeValidationError } from '../core/errors';
import type { MarkupValidator } from '../security/validator';

export interface TemplateDefinition {
    id: string;
    label: string;
    markup: string;
}

export const DEFAULT_TEMPLATES: readonly TemplateDefinition[] = [
    { id: 'fraction', label: 'Fraction', markup: '\\frac{}{}' },
    { id: 'sqrt', label: 'Square root', markup: '\\sqrt{}' },
    { id: 'nthroot', label: 'n-th root', markup: '\\sqrt[]{}' },
    { id: 'power', label: 'Power', markup: '{}^{}' },
    { id: 'subscript', label: 'Subscript', markup: '{}_{}' },
    { id: 'integral', label: 'Integral', markup: '\\int_{}^{}{}' },
    { id: 'sum', label: 'Sum', markup: '\\sum_{}^{}{}' },
    { id: 'product', label: 'Product', markup: '\\prod_{}^{}{}' },
    { id: 'limit', label: 'Limit', markup: '\\lim_{}{}' },
    { id: 'parens', label: 'Parentheses', markup: '\\left( {} \\right)' },
    { id: 'abs', label: 'Absolute value', markup: '\\left| {} \\right|' },
    { id: 'matrix2', label: '2×2 matrix', markup: '\\begin{pmatrix} & \\\\ & \\end{pmatrix}' },
    { id: 'matrix3', label: '3×3 matrix', markup: '\\begin{bmatrix} & & \\\\ & & \\\\ & & \\end{bmatrix}' },
    { id: 'cases', label: 'Cases', markup: '\\begin{cases} & \\\\ & \\end{cases}' },
    { id: 'text', label: 'Text', markup: '\\text{}' },
    { id: 'bold', label: 'Bold', markup: '\\textbf{}' },
    { id: 'color-red', label: 'Red', markup: '\\textcolor{red}{}' },
    { id: 'color-blue', label: 'Blue', markup: '\\textcolor{blue}{}' },
    { id: 'size-large', label: 'Large', markup: '{\\large }' },
    { id: 'size-small', label: 'Small', markup: '{\\small }' },
];

export class TemplateCatalog {
    private readonly entries = new Map<string, { definition: TemplateDefinition; tree: ExprNode }>();

    constructor(private readonly validator: MarkupValidator, definitions: readonly TemplateDefinition[] = DEFAULT_TEMPLATES) {
        for (const definition of definitions) this.register(definition);
    }

    /** Throws when the fragment does not validate or parse; templates are configuration, not user input. */
    register(definition: TemplateDefinition): void {
        const report = this.validator.inspect(definition.markup);
        if (report.errors.length > 0) {
            const reasons = report.errors.map(describeValidationError).join('; ');
            throw new Error(`[Templates] "${definition.id}" rejected: ${reasons}`);
        }
        if (!report.parsed || !report.parsed.ok) {
            const reasons = report.parsed && !report.parsed.ok ? report.parsed.errors.map(e => e.message).join('; ') : 'not parsed';
            throw new Error(`[Templates] "${definition.id}" does not parse: ${reasons}`);
        }
        this.entries.set(definition.id, { definition, tree: report.parsed.tree });
    }

    get(id: string): ExprNode | null {
        return this.entries.get(id)?.tree ?? null;
    }

    has(id: string): boolean {
        return this.entries.has(id);
    }

    list(): TemplateDefinition[] {
        return [...this.entries.values()].map(e => e.definition);
    }
}
