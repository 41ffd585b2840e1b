/**
 * Options controlling how values are reflected into and out of records.
 */
export interface ReflectOptions {
  /**
   * Store the zero value of the target when a null value reaches a target
   * that cannot represent null, instead of reporting an error.
   */
  unhandledNullAsEmpty?: boolean;
  /**
   * Store the zero value of the target when an unknown value reaches a
   * target that cannot represent unknown values, instead of reporting an
   * error.
   */
  unhandledUnknownAsEmpty?: boolean;
  /**
   * Truncate fractional numbers stored into integer targets instead of
   * reporting an error.
   */
  allowRoundingNumbers?: boolean;
  /**
   * Maximum number of path steps below the conversion root at which a record
   * may still be converted. Defaults to {@link DEFAULT_MAX_DEPTH}.
   */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 64;

export function resolveMaxDepth(opts: ReflectOptions): number {
  return opts.maxDepth ?? DEFAULT_MAX_DEPTH;
}
