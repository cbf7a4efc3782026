import { Cart, Coupon, User } from '../models.js';
import { toCalendarDate } from '../calendar.js';
import {
  DEFAULT_ELIGIBILITY_RULES,
  EligibilityRuleName,
  IEligibilityRule,
} from '../rules/IEligibilityRule.js';

export interface EligibilityReport {
  eligible: boolean;
  failedRules: EligibilityRuleName[];
}

/**
 * Checks a coupon against every configured rule. The evaluation date is
 * always passed in; nothing here reads the clock.
 */
export class EligibilityEvaluator {
  constructor(
    private readonly rules: readonly IEligibilityRule[] = DEFAULT_ELIGIBILITY_RULES
  ) {}

  isEligible(coupon: Coupon, user: User, cart: Cart, evaluationDate: Date): boolean {
    const context = { coupon, user, cart, evaluationDate: toCalendarDate(evaluationDate) };
    return this.rules.every(rule => rule.isSatisfied(context));
  }

  // same verdict as isEligible, but runs every rule so callers can see all failures
  evaluate(coupon: Coupon, user: User, cart: Cart, evaluationDate: Date): EligibilityReport {
    const context = { coupon, user, cart, evaluationDate: toCalendarDate(evaluationDate) };
    const failedRules = this.rules
      .filter(rule => !rule.isSatisfied(context))
      .map(rule => rule.name);

    return { eligible: failedRules.length === 0, failedRules };
  }
}
