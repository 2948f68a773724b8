const LABEL_COUNT = 26;
const FIRST_LABEL = "A".charCodeAt(0);

/** `A`..`Z` for the first 26 sessions; later sessions have no label. */
export const sessionLabel = (position: number): string | undefined =>
  Number.isInteger(position) && position >= 0 && position < LABEL_COUNT
    ? String.fromCharCode(FIRST_LABEL + position)
    : undefined;

export const labelPosition = (letter: string): number | undefined => {
  if (!/^[a-z]$/i.test(letter)) {
    return undefined;
  }
  return letter.toUpperCase().charCodeAt(0) - FIRST_LABEL;
};
