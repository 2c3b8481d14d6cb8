const SET_SPEC_PATTERN = /^[A-Za-z0-9\-_.!~*'()]+(?::[A-Za-z0-9\-_.!~*'()]+)*$/;

export const isValidSetSpec = (value: string): boolean => SET_SPEC_PATTERN.test(value);

/**
 * `a:b` is inside `a`; `ab` is not.
 */
export const isWithinSet = (filter: string, membership: string): boolean =>
  membership === filter || membership.startsWith(`${filter}:`);
