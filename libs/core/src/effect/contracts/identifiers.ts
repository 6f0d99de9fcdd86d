export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isIdentifier = (value: string): boolean => IDENTIFIER_PATTERN.test(value);
