export type TemplateContext = { [key: string]: string | TemplateContext };

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*)\s*\}\}/g;

/**
 * Replaces `{{ dotted.path }}` placeholders with values from `context`.
 * Unknown paths render as an empty string.
 */
export function renderTemplate(template: string, context: TemplateContext): string {
  return template.replace(PLACEHOLDER, (_match, expression: string) => {
    let current: string | TemplateContext | undefined = context;
    for (const part of expression.split('.')) {
      if (current === undefined || typeof current === 'string') {
        return '';
      }
      current = Object.prototype.hasOwnProperty.call(current, part) ? current[part] : undefined;
    }
    return typeof current === 'string' ? current : '';
  });
}
