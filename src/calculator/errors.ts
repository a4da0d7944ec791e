/**
 * ReportCalc – Calculator errors
 *
 *   CalculatorError
 *    ├─ FieldNotFoundError     argument path missing under strict mode
 *    ├─ FunctionNotFoundError  mapping names an unregistered function
 *    └─ CalculationError       a registered function threw
 *
 * License: Apache-2.0
 */

export type CalculatorErrorCode =
  | 'E_FIELD_NOT_FOUND'
  | 'E_FUNCTION_NOT_FOUND'
  | 'E_CALCULATION';

export class CalculatorError extends Error {
  public override readonly name: string = 'CalculatorError';

  constructor(
    message: string,
    public readonly code: CalculatorErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isCalculatorError(err: unknown): err is CalculatorError {
  return err instanceof CalculatorError;
}

/**
 * Section name → keys present, listed in the message to help spot typos.
 */
export type AvailableFields = Record<string, string[]>;

export class FieldNotFoundError extends CalculatorError {
  public override readonly name = 'FieldNotFoundError';

  constructor(
    public readonly fieldPath: string,
    public readonly availableFields: AvailableFields = {},
  ) {
    const sections = Object.entries(availableFields)
      .map(([section, keys]) => `${section}: [${keys.join(', ')}]`)
      .join('; ');
    super(
      sections
        ? `Field not found: ${fieldPath} (available fields: ${sections})`
        : `Field not found: ${fieldPath}`,
      'E_FIELD_NOT_FOUND',
    );
  }
}

export class FunctionNotFoundError extends CalculatorError {
  public override readonly name = 'FunctionNotFoundError';

  constructor(public readonly functionName: string) {
    super(`Function not found: ${functionName}`, 'E_FUNCTION_NOT_FOUND');
  }
}

export class CalculationError extends CalculatorError {
  public override readonly name = 'CalculationError';

  constructor(
    public readonly functionName: string,
    public readonly args: readonly unknown[],
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Error executing function '${functionName}' with args ${JSON.stringify(args)}: ${reason}`,
      'E_CALCULATION',
      { cause },
    );
  }
}
