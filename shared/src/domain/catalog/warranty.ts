/**
 * Warranty Calculator - Pure Functions
 *
 * Each warranty group has rules (one per duration). A rule prices the
 * add-on as a share of the product's base price with a floor:
 *
 *   addOn = max(minimum, basePrice × percentage)   (half-up, 2 places)
 *
 * Tiers come out ordered by ascending duration.
 */

import { Decimal } from 'decimal.js';
import { roundMoney } from './money.js';
import type { WarrantyRule, WarrantyTier } from '../../types/index.js';

const ZERO = new Decimal(0);

function byDuration(a: WarrantyRule, b: WarrantyRule): number {
    // Rules without a duration sort last
    const da = a.durationMonths ?? Number.POSITIVE_INFINITY;
    const db = b.durationMonths ?? Number.POSITIVE_INFINITY;
    if (da !== db) return da < db ? -1 : 1;
    return a.id - b.id;
}

/**
 * Compute add-on price tiers for one warranty group.
 * An empty rule list yields an empty tier list. Rules repeated by id count once.
 */
export function computeWarrantyTiers(basePrice: Decimal | null, rules: readonly WarrantyRule[]): WarrantyTier[] {
    const seen = new Set<number>();
    const unique = rules.filter((rule) => {
        if (seen.has(rule.id)) return false;
        seen.add(rule.id);
        return true;
    });

    const base = basePrice ?? ZERO;

    return [...unique].sort(byDuration).map((rule) => {
        const share = base.times(rule.percentage ?? ZERO);
        const addOn = Decimal.max(rule.minimum ?? ZERO, share);
        return {
            ruleId: rule.id,
            name: rule.name,
            durationMonths: rule.durationMonths,
            addOnPrice: roundMoney(addOn),
        };
    });
}

/** Index rules by group id */
export function groupWarrantyRules(rules: readonly WarrantyRule[]): Map<number, WarrantyRule[]> {
    const byGroup = new Map<number, WarrantyRule[]>();
    for (const rule of rules) {
        const list = byGroup.get(rule.groupId);
        if (list) {
            list.push(rule);
        } else {
            byGroup.set(rule.groupId, [rule]);
        }
    }
    return byGroup;
}

/** Price of the variant that bundles the product with this tier */
export function tierVariantPrice(basePrice: Decimal | null, tier: WarrantyTier): Decimal {
    return roundMoney((basePrice ?? ZERO).plus(tier.addOnPrice));
}

/** Variant label, e.g. "Garantie Plus 36 Monate" */
export function tierLabel(tier: WarrantyTier): string {
    return tier.durationMonths === null ? tier.name : `${tier.name} ${tier.durationMonths} Monate`;
}
