/**
 * Identifier case conversion for generated code.
 */

/**
 * Converts a PascalCase, camelCase or hyphenated name to snake_case.
 *
 * @example
 * ```ts
 * toSnakeCase("UserProfile");     // => "user_profile"
 * toSnakeCase("Events-ByDate");   // => "events_by_date"
 * toSnakeCase("HTTPRequestLog");  // => "http_request_log"
 * ```
 */
export const toSnakeCase = (name: string): string =>
  name
    .replace(/-/g, "_")
    .replace(/(.)([A-Z][a-z]+)/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase()
    .replace(/_+/g, "_");

const capitalize = (word: string): string =>
  word.length === 0 ? word : `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`;

/** `"user_profile"` or `"UserProfile"` => `"UserProfile"`. */
export const toPascalCase = (name: string): string =>
  toSnakeCase(name).split("_").map(capitalize).join("");

/** `"user_profile"` => `"userProfile"`. */
export const toCamelCase = (name: string): string => {
  const pascal = toPascalCase(name);
  return `${pascal.charAt(0).toLowerCase()}${pascal.slice(1)}`;
};

/** `"UserProfile"` => `"USER_PROFILE"`. */
export const toConstantCase = (name: string): string =>
  toSnakeCase(name).toUpperCase();
