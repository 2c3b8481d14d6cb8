/**
 * Keys are loaded once at start-up. `previousKey` is only set during a rotation window.
 */
export interface SigningKeySource {
  currentKey(): string;
  previousKey(): string | undefined;
}
