/**
 * Assertion utilities for contract checks.
 *
 * Typed helpers that throw when a caller breaks a precondition: absent values,
 * non-integer indexes and out-of-range zoom levels. These are programming errors,
 * not conditions to recover from.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @example
 * ```ts
 * const bc = this.Bc[zoom]
 * assertValue(bc, `No projection constants for zoom ${zoom}`)
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

/**
 * Assert that `value` is an integer within `[min, max]`.
 */
export function assertIntegerInRange(
	value: number,
	min: number,
	max: number,
	name = "value",
) {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw Error(`${name} must be an integer in [${min}, ${max}], got ${value}`)
	}
}
