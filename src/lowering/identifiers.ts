import { invariant } from '../diagnostics/errors.js';
import type {
  ComdatIdentNode,
  GlobalIdentNode,
  LabelIdentNode,
  LocalIdentNode,
} from '../frontend/ast.js';
import { unquoteName } from './escape.js';

function stripPrefix(what: string, text: string, prefix: string): string {
  invariant(
    text.startsWith(prefix),
    `invalid ${what} identifier ${JSON.stringify(text)}; missing '${prefix}' prefix`,
  );
  return unquoteName(text.slice(prefix.length));
}

/** Name of a global identifier, without its `@` prefix. */
export function global(n: GlobalIdentNode): string {
  return stripPrefix('global', n.text, '@');
}

/** Name of a local identifier, without its `%` prefix. */
export function local(n: LocalIdentNode): string {
  return stripPrefix('local', n.text, '%');
}

/**
 * `undefined` when the identifier is absent. An explicit `%""` is the empty name, not absence.
 */
export function optionalLocal(n: LocalIdentNode | undefined): string | undefined {
  if (!n) return undefined;
  return local(n);
}

/** Name of a label identifier, without its `:` suffix. */
export function label(n: LabelIdentNode): string {
  const suffix = ':';
  invariant(
    n.text.endsWith(suffix),
    `invalid label identifier ${JSON.stringify(n.text)}; missing '${suffix}' suffix`,
  );
  return unquoteName(n.text.slice(0, -suffix.length));
}

export function optionalLabel(n: LabelIdentNode | undefined): string | undefined {
  if (!n) return undefined;
  return label(n);
}

/** Name of a comdat identifier, without its `$` prefix. */
export function comdat(n: ComdatIdentNode): string {
  return stripPrefix('comdat', n.text, '$');
}
