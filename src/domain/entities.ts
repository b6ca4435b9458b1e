/**
 * Domain Entities
 *
 * Pure domain objects without infrastructure concerns.
 */

// ============================================
// Value Objects (Branded types for type safety)
// ============================================

/** Store-minted identifier, rendered as a 24-character hex string. */
export type UserId = string & { readonly __brand: "UserId" };

export const UserId = (id: string): UserId => id as UserId;

// ============================================
// Domain Entities
// ============================================

export interface User {
  readonly id: UserId;
  readonly name: string;
  readonly email: string;
}
