import { singleValueArgument } from '@cloud-copilot/cli'

type NumericArgumentFactory = ReturnType<typeof singleValueArgument<number>>

type NumericValidation = { valid: true; value: number } | { valid: false; message: string }

export function validateInteger(rawValue: string): NumericValidation {
  const value = Number(rawValue)
  if (rawValue.trim() === '' || !Number.isInteger(value)) {
    return { valid: false, message: `Value is not an integer: ${rawValue}` }
  }
  return { valid: true, value }
}

export function validateFactor(rawValue: string): NumericValidation {
  const value = Number(rawValue)
  if (rawValue.trim() === '' || !Number.isFinite(value)) {
    return { valid: false, message: `Value is not a number: ${rawValue}` }
  }
  return { valid: true, value }
}

export const integerArgument: NumericArgumentFactory = singleValueArgument<number>(validateInteger, '. An integer.')

export const factorArgument: NumericArgumentFactory = singleValueArgument<number>(validateFactor, '. A decimal number.')
