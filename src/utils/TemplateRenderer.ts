export type TemplateBindings = Readonly<Record<string, string | number | undefined>>;

const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g;

/**
 * Substitutes `{{name}}` placeholders. Unknown names render as an empty
 * string; single braces are left alone so Rust blocks survive.
 */
export function renderTemplate(template: string, bindings: TemplateBindings): string {
    return template.replace(VARIABLE_PATTERN, (_match, key: string) => {
        const value = bindings[key];
        return value === undefined ? '' : String(value);
    });
}
