/**
 * Helpers shared by the systems
 */

import type { SocialClass, SocialRole } from '../core/types.js';

/**
 * Clamp value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Wealth a class burns each tick just to exist as itself
 */
export function consumptionNeeds(cls: SocialClass): number {
  return cls.sBio + cls.sClass;
}

export const PRODUCER_ROLES: ReadonlySet<SocialRole> = new Set([
  'periphery_proletariat',
  'internal_proletariat',
  'labor_aristocracy',
]);

export const BOURGEOIS_ROLES: ReadonlySet<SocialRole> = new Set([
  'core_bourgeoisie',
  'comprador_bourgeoisie',
]);

/**
 * Roles held inside the carceral system
 */
export const PRISONER_ROLES: ReadonlySet<SocialRole> = new Set(['internal_proletariat']);

/**
 * Roles the struggle mechanics act on, and whose consciousness decides
 * revolutionary victory
 */
export const PROLETARIAN_ROLES: ReadonlySet<SocialRole> = new Set([
  'periphery_proletariat',
  'internal_proletariat',
]);
