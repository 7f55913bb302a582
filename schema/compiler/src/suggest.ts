/**
 * "Did you mean" hints for names that do not resolve.
 */
export function suggestName(
  invalidName: string,
  validNames: Iterable<string>,
  noun: string
): string {
  const names = Array.from(validNames);
  const needle = invalidName.toLowerCase();
  const similar = names.filter(
    (name) =>
      needle.length > 0 &&
      (name.toLowerCase().includes(needle) || needle.includes(name.toLowerCase()))
  );

  if (similar.length > 0) {
    return `Did you mean "${similar[0]}"?`;
  }

  return names.length > 0 ? `Available ${noun}: ${names.join(", ")}` : `No ${noun} are declared`;
}
