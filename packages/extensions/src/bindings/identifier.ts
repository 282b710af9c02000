const VALID_IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isValidIdentifier(str: string): boolean {
  return VALID_IDENTIFIER.test(str);
}

/**
 * Turn a directory or file stem into an export name for a barrel.
 * Kebab-case becomes camelCase ("my-shaders" → "myShaders"); any other
 * character that cannot appear in an identifier becomes `_`.
 */
export function bindingIdentifier(name: string): string {
  if (isValidIdentifier(name)) return name;

  let id = name.includes("-")
    ? name
      .split("-")
      .map((part, i) => (i === 0 ? part : part.charAt(0).toUpperCase() + part.slice(1)))
      .join("")
    : name;
  id = id.replace(/[^A-Za-z0-9_$]/g, "_");
  return /^[A-Za-z_$]/.test(id) ? id : `_${id}`;
}
