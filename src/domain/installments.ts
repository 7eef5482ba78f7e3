/**
 * Installment plans: one purchase split into equal monthly expenses.
 */
import { addMonthsClamped, roundHalfUp } from './computations.js';
import { fail, ok, type InstallmentPlanItem, type InstallmentSchedule, type Result } from './types.js';

/** Thirty years of monthly installments */
export const MAX_INSTALLMENTS = 360;

export interface InstallmentRequest {
  category: string;
  totalAmount: number;
  description: string;
  count: number;
  start: Date;
}

export function installmentDescription(description: string, index: number, count: number): string {
  return `${description} (cuota ${index}/${count})`.trim();
}

/**
 * Every installment gets round(total / count, 2); the remainder is not spread,
 * so the sum may differ from the total by up to count × 0.005.
 */
export function buildInstallmentPlan(request: InstallmentRequest): Result<InstallmentSchedule> {
  const { category, totalAmount, description, count, start } = request;
  if (!Number.isInteger(count)) {
    return fail({ code: 'InvalidInstallmentCount', token: String(count), reason: 'not_integer' });
  }
  if (count <= 0) {
    return fail({ code: 'InvalidInstallmentCount', token: String(count), reason: 'not_positive' });
  }
  if (count > MAX_INSTALLMENTS) {
    return fail({ code: 'InvalidInstallmentCount', token: String(count), reason: 'too_many' });
  }

  const installmentAmount = roundHalfUp(totalAmount / count, 2);
  return ok({ category, totalAmount, description, start, count, installmentAmount });
}

/** Installments of a plan, produced one at a time */
export function* installmentItems(schedule: InstallmentSchedule): Generator<InstallmentPlanItem> {
  for (let i = 0; i < schedule.count; i++) {
    yield {
      index: i + 1,
      date: addMonthsClamped(schedule.start, i),
      amount: schedule.installmentAmount,
      description: installmentDescription(schedule.description, i + 1, schedule.count),
    };
  }
}
