/**
 * Compile-time exhaustive check for discriminated unions.
 * Use as the default case in switch statements: adding a variant without
 * handling it becomes a type error here.
 */
export const assertNever = (value: never): never => {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`)
}
