export type VariableFinderFn = (name: string) => string | undefined;

/**
 * Replace `${{ name }}` placeholders in the input.
 * Placeholders without a value are left untouched.
 */
function convertPlaceholder({ input, variableFinder }: { input: string; variableFinder: VariableFinderFn }): string {
  const matches: RegExpExecArray[] = extractPlaceholder(input);
  let result = input;
  for (const match of matches) {
    const placeholder = match[0];
    const name = match[1];
    const value = name === undefined ? undefined : variableFinder(name);
    result = result.replace(placeholder, () => value ?? placeholder);
  }
  return result;
}

function extractPlaceholder(input: string) {
  const regexp: RegExp = new RegExp('\\${{\\s*([a-zA-Z_]+[a-zA-Z0-9\\._-]*)\\s*}}', 'g');

  return matchAll(input, regexp);
}

function matchAll(input: string, regexp: RegExp, matches: Array<RegExpExecArray> = []) {
  const matchIfAny = regexp.exec(input);
  if (matchIfAny) {
    matches.push(matchIfAny);

    // recurse until no more matches
    matchAll(input, regexp, matches);
  }
  return matches;
}

export { convertPlaceholder, extractPlaceholder };
