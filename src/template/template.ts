import { MissingVariableError } from '../errors.js';

export interface TemplateOptions {
  /** Leave unresolved or malformed placeholders in place instead of throwing */
  silenceErrors?: boolean;
}

// $$ | $name | ${name} | a lone $ (invalid)
const PLACEHOLDER = /\$(?:(\$)|([_A-Za-z][_A-Za-z0-9]*)|\{([_A-Za-z][_A-Za-z0-9]*)\}|())/g;

function lineAndColumn(text: string, offset: number): string {
  const before = text.slice(0, offset);
  const line = before.split('\n').length;
  const column = offset - before.lastIndexOf('\n');
  return `line ${line}, col ${column}`;
}

/**
 * Substitute `$name` and `${name}` placeholders from `mapping`; `$$` is a
 * literal `$`.
 *
 * @throws MissingVariableError in strict mode, for a name that is not in
 * the mapping or a `$` that starts no valid placeholder
 */
export function templatePayload(
  template: string,
  mapping: Readonly<Record<string, string>>,
  options: TemplateOptions = {}
): string {
  const silence = options.silenceErrors ?? false;

  return template.replace(
    PLACEHOLDER,
    (match: string, escaped?: string, named?: string, braced?: string, invalid?: string, offset = 0) => {
      if (escaped !== undefined) {
        return '$';
      }
      const name = named ?? braced;
      if (name !== undefined) {
        if (Object.prototype.hasOwnProperty.call(mapping, name)) {
          return mapping[name];
        }
        if (silence) return match;
        throw new MissingVariableError(name);
      }
      if (invalid !== undefined && !silence) {
        throw new MissingVariableError(
          match,
          `Invalid placeholder in template: ${lineAndColumn(template, offset)}`
        );
      }
      return match;
    }
  );
}
