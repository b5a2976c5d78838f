import { combineLatest, map, of, type Observable } from 'rxjs';
import { type ExecutionContext } from './contracts';

type TemplatePart = { kind: 'text'; text: string } | { kind: 'path'; path: string };

const PLACEHOLDER = /\\\$\{|\$\{([^}]*)\}/g;

export function parseTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = '';
  let last = 0;
  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    text += template.slice(last, index);
    last = index + match[0].length;
    if (match[0] === '\\${') {
      text += '${';
      continue;
    }
    if (text.length > 0) {
      parts.push({ kind: 'text', text });
      text = '';
    }
    parts.push({ kind: 'path', path: (match[1] ?? '').trim() });
  }
  text += template.slice(last);
  if (text.length > 0) {
    parts.push({ kind: 'text', text });
  }
  return parts;
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Interpolates `${path}` placeholders from the data model and re-emits
 * whenever one of the referenced values changes. `\${` is a literal `${`.
 */
export function interpolate(template: string, context: ExecutionContext): Observable<string> {
  const parts = parseTemplate(template);
  if (parts.every((part) => part.kind === 'text')) {
    return of(parts.map((part) => (part.kind === 'text' ? part.text : '')).join(''));
  }

  const values = parts.map((part) =>
    part.kind === 'text' ? of(part.text) : context.subscribe(part.path).pipe(map(stringify))
  );
  return combineLatest(values).pipe(map((resolved) => resolved.join('')));
}
