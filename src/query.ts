/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

/** A query name and its value. The value is null when the pair has no `=`. */
export type QueryParameter = [name: string, value: string | null];

/**
 * Splits an encoded query into its pairs. The empty string is one pair with an empty
 * name and no value.
 */
export function parseQuery(input: string): QueryParameter[] {
  const output: QueryParameter[] = [];
  let pos = 0;
  // 1. For each sequence of input delimited by U+0026 (&):
  while (pos <= input.length) {
    let ampersandOffset = input.indexOf('&', pos);
    if (ampersandOffset === -1) {
      ampersandOffset = input.length;
    }
    // 1. The first U+003D (=) in the sequence, if any, separates name from value.
    const equalsOffset = input.indexOf('=', pos);
    if (equalsOffset === -1 || equalsOffset > ampersandOffset) {
      // 2. Without U+003D (=), the value is absent.
      output.push([input.slice(pos, ampersandOffset), null]);
    } else {
      output.push([input.slice(pos, equalsOffset), input.slice(equalsOffset + 1, ampersandOffset)]);
    }
    pos = ampersandOffset + 1;
  }
  return output;
}

// Joins pairs with U+0026 (&), omitting U+003D (=) for absent values.
export function serializeQuery(parameters: ReadonlyArray<Readonly<QueryParameter>>): string {
  let output = '';
  for (let index = 0; index < parameters.length; index++) {
    const [name, value] = parameters[index];
    if (index > 0) {
      output += '&';
    }
    output += name;
    if (value !== null) {
      output += `=${value}`;
    }
  }
  return output;
}
