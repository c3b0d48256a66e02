import type { NamespaceBinding, Target } from '@kvctl/schemas';
import { BindingNotFoundError, DuplicateBindingError } from '../errors.js';

/**
 * First binding name that appears more than once, if any.
 * @internal
 */
function findDuplicateBinding(
  namespaces: readonly NamespaceBinding[],
): string | undefined {
  const seen = new Set<string>();
  for (const namespace of namespaces) {
    if (seen.has(namespace.binding)) {
      return namespace.binding;
    }
    seen.add(namespace.binding);
  }
  return undefined;
}

/**
 * Resolves a binding name to its remote namespace id.
 *
 * Duplicates are checked first and unconditionally: an ambiguous target
 * fails even when the requested binding is unique or absent.
 * @param target - Target holding the bindings
 * @param binding - Binding name to resolve
 * @returns Namespace id of the matching binding
 * @throws {DuplicateBindingError} When any binding name repeats
 * @throws {BindingNotFoundError} When no binding matches
 */
export function getNamespaceId(target: Target, binding: string): string {
  const namespaces = target.kv_namespaces ?? [];

  const duplicate = findDuplicateBinding(namespaces);
  if (duplicate !== undefined) {
    throw new DuplicateBindingError(duplicate, target.name);
  }

  const match = namespaces.find((namespace) => namespace.binding === binding);
  if (!match) {
    throw new BindingNotFoundError(binding, target.name);
  }
  return match.id;
}
