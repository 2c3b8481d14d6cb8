import type { Env } from "../../shared/config/env";
import type { SigningKeySource } from "../../ports/SigningKeySource";

export const createStaticKeySource = (
  env: Pick<Env, "HARVEST_SIGNING_KEY" | "HARVEST_PREVIOUS_SIGNING_KEY">
): SigningKeySource => {
  const current = env.HARVEST_SIGNING_KEY;
  const previous = env.HARVEST_PREVIOUS_SIGNING_KEY;

  return {
    currentKey: () => current,
    previousKey: () => (previous !== undefined && previous !== current ? previous : undefined)
  };
};
