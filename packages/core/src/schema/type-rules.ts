/**
 * Column type comparison and Delta type-widening rules.
 */

/** Widening pairs the engine can apply in place: from → allowed targets */
const WIDENING: Readonly<Record<string, readonly string[]>> = {
  TINYINT: ['SMALLINT', 'INT', 'BIGINT'],
  SMALLINT: ['INT', 'BIGINT'],
  INT: ['BIGINT'],
  FLOAT: ['DOUBLE'],
};

/** Uppercase, whitespace removed: `decimal(10, 2)` → `DECIMAL(10,2)` */
export function normalizeType(type: string): string {
  return type.toUpperCase().replace(/\s+/g, '');
}

/** Normalized type without its parameter list: `DECIMAL(10,2)` → `DECIMAL` */
export function baseType(type: string): string {
  const normalized = normalizeType(type);
  const paren = normalized.indexOf('(');
  return paren === -1 ? normalized : normalized.slice(0, paren);
}

/** True only for allow-listed widening pairs. Same type is not widening. */
export function isWidening(fromType: string, toType: string): boolean {
  return WIDENING[baseType(fromType)]?.includes(baseType(toType)) ?? false;
}

export interface TypeChangeCheck {
  readonly supported: boolean;
  readonly errorMessage?: string;
}

/**
 * Decide whether a column type change can be applied.
 *
 * Exact matches and allow-listed widenings are supported. Reparameterizing a
 * type (e.g. DECIMAL precision or scale) has no widening path and is rejected.
 */
export function checkTypeChange(fromType: string, toType: string): TypeChangeCheck {
  if (normalizeType(fromType) === normalizeType(toType)) {
    return { supported: true };
  }

  if (isWidening(fromType, toType)) {
    return { supported: true };
  }

  if (baseType(fromType) === baseType(toType)) {
    return {
      supported: false,
      errorMessage:
        `Type change from ${fromType} to ${toType} is not supported. ` +
        `Changing the parameters of ${baseType(toType)} requires recreating the column.`,
    };
  }

  return {
    supported: false,
    errorMessage:
      `Type change from ${fromType} to ${toType} is not supported. ` +
      'Only widening conversions are allowed.',
  };
}
