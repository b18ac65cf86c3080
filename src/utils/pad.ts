/** Left-pad `value` with `character` up to `length`. Never truncates. */
export function padStartWith(value: string, character: string, length: number): string {
  if (character.length !== 1) {
    throw new Error(`padding character must be a single character, got "${character}"`);
  }
  const paddingCount = length - value.length;
  if (paddingCount <= 0) {
    return value;
  }
  return character.repeat(paddingCount) + value;
}
