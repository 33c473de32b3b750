/**
 * Standard messages for parser diagnostics.
 * Placeholders in braces are filled by `formatMessage`.
 */
export const ParserErrorMessages = {
  UNTERMINATED_GROUP: 'Group opened here is never closed',
  UNTERMINATED_OPTIONAL: 'Optional argument opened here is never closed',
  UNTERMINATED_ENVIRONMENT: 'Environment "{name}" is never closed',
  UNTERMINATED_MATH: 'Math opened with {delimiter} is never closed',
  ENVIRONMENT_MISMATCH: '\\end{{found}} closes environment "{expected}"',
  ENVIRONMENT_MISSING_NAME: '\\end without a name closes environment "{expected}"',
  MATH_DELIMITER_MISMATCH: '{found} closes math opened with {expected}',
  UNEXPECTED_CLOSE: 'Unexpected {token} with nothing open to close',
  MISSING_ARGUMENT: '\\{name} expects {expected} mandatory argument(s), found {found}',
  MISSING_ENVIRONMENT_NAME: '\\begin is missing its environment name',
  INVALID_ARGUMENT_COUNT: 'Argument count "{value}" for \\{name} must be a number from 0 to 9',
  MISSING_MACRO_NAME: '\\{name} is missing the name of the macro it defines'
} as const;

export type ParserErrorMessageKey = keyof typeof ParserErrorMessages;

export function formatMessage(
  key: ParserErrorMessageKey,
  values: Record<string, string | number> = {}
): string {
  return ParserErrorMessages[key].replace(/\{(\w+)\}/g, (match, name: string) =>
    name in values ? String(values[name]) : match
  );
}
