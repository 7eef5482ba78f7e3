/**
 * Reply templates. Pure: result in, text out.
 */
import type {
  BudgetStatus,
  Goal,
  InstallmentSchedule,
  LedgerError,
  MonthTotals,
  Movement,
  YearMonth,
} from '../domain/types.js';
import { MAX_INSTALLMENTS } from '../domain/installments.js';

type InstallmentCountReason = Extract<LedgerError, { code: 'InvalidInstallmentCount' }>['reason'];

/** Which command an argument error belongs to (usage hints differ) */
export type ErrorContext =
  | { kind: 'movement'; command: string }
  | { kind: 'installments' }
  | { kind: 'budget' }
  | { kind: 'goal' }
  | { kind: 'none' };

const groupedMoney = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** $1,234.50 */
export function formatMoney(amount: number): string {
  return `$${groupedMoney.format(amount)}`;
}

const plainMoney = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: false,
});

/** 1234.50 */
function plain(amount: number): string {
  return plainMoney.format(amount);
}

const INSTALLMENTS_EXAMPLE = 'Ej: /cuotas hogar 30000 pava electrica 3';
const INVALID_AMOUNT = '❌ El monto no es válido.';

export const UNRECOGNIZED_COMMAND = '❓ Comando no reconocido. Usa /help para ver las opciones.';
export const HANDLER_FAULT = '⚠️ Ocurrió un error procesando el comando. Probá de nuevo.';

export function formatUsage(firstName: string): string {
  return [
    `Hola ${firstName} 👋`,
    'Soy tu bot de finanzas.',
    '',
    'Comandos disponibles:',
    '/gasto categoria monto descripcion',
    '/gasto_usd categoria monto descripcion',
    '/ingreso categoria monto descripcion',
    '/ingreso_usd categoria monto descripcion',
    '/cuotas categoria monto descripcion cantidad',
    '/resumen - Resumen del mes actual',
    '/saldo - Ingresos - Gastos del mes actual',
    '/presupuesto categoria monto',
    '/presupuestos - Presupuestos y gasto del mes',
    '/objetivo nombre monto',
    '/objetivos - Ver objetivos de ahorro',
    '/help - Ver este mensaje otra vez',
  ].join('\n');
}

export function formatMovementRecorded(movement: Movement): string {
  const label = movement.kind === 'expense' ? 'Gasto' : 'Ingreso';
  const symbol = movement.currency === 'ARS' ? '$' : 'USD ';
  return `✅ ${label} registrado: ${symbol}${plain(movement.amount)} en '${movement.category}' (${movement.currency}).`;
}

export function formatInstallments(schedule: InstallmentSchedule): string {
  return (
    '✅ Compra en cuotas registrada.\n' +
    `Total: $${plain(schedule.totalAmount)} en ${schedule.count} cuotas de $${plain(schedule.installmentAmount)}.`
  );
}

export function formatSummary(totals: MonthTotals, { year, month }: YearMonth): string {
  const lines = [
    `📅 Resumen de ${month}/${year} (solo ARS)`,
    '',
    `💰 Ingresos: ${formatMoney(totals.income)}`,
    `💸 Gastos: ${formatMoney(totals.expense)}`,
    `🧾 Saldo: ${formatMoney(totals.income - totals.expense)}`,
  ];
  if (totals.excludedForeign > 0) {
    lines.push('', `ℹ️ ${totals.excludedForeign} movimiento(s) en otra moneda no están incluidos.`);
  }
  return lines.join('\n');
}

export function formatBalance(totals: MonthTotals): string {
  return `💼 Saldo del mes actual (ARS): ${formatMoney(totals.income - totals.expense)}`;
}

export function formatBudgetSaved(category: string, amount: number): string {
  return `✅ Presupuesto guardado para '${category}': $${plain(amount)} por mes.`;
}

export function formatGoalSaved(name: string, amount: number): string {
  return `✅ Objetivo '${name}' guardado por $${plain(amount)}.`;
}

export function formatBudgetStatus(statuses: BudgetStatus[], { year, month }: YearMonth): string {
  if (statuses.length === 0) {
    return 'Todavía no cargaste presupuestos. Usa /presupuesto categoria monto';
  }
  const lines = statuses.map((s) => {
    const tail = s.remaining >= 0
      ? `quedan ${formatMoney(s.remaining)}`
      : `excedido por ${formatMoney(-s.remaining)}`;
    return `• ${s.category}: ${formatMoney(s.spent)} de ${formatMoney(s.budgeted)} (${tail})`;
  });
  return [`📊 Presupuestos de ${month}/${year} (solo ARS)`, '', ...lines].join('\n');
}

export function formatGoals(goals: Goal[]): string {
  if (goals.length === 0) {
    return 'Todavía no cargaste objetivos. Usa /objetivo nombre monto';
  }
  return ['🎯 Objetivos', '', ...goals.map((g) => `• ${g.name}: ${formatMoney(g.targetAmount)}`)].join('\n');
}

function missingArguments(context: ErrorContext): string {
  switch (context.kind) {
    case 'movement':
      return `❌ Faltan datos. Usa: categoria monto descripcion\nEjemplo: ${context.command} comida 5000 empanadas`;
    case 'installments':
      return `❌ Faltan datos.\nUsa: /cuotas categoria monto descripcion cantidad\n${INSTALLMENTS_EXAMPLE}`;
    case 'budget':
      return '❌ Usa: /presupuesto categoria monto\nEj: /presupuesto comida 50000';
    case 'goal':
      return '❌ Usa: /objetivo nombre monto\nEj: /objetivo viaje_brasil 300000';
    case 'none':
      return '❌ Faltan datos.';
  }
}

function invalidInstallmentCount(reason: InstallmentCountReason): string {
  switch (reason) {
    case 'not_positive':
      return '❌ La cantidad de cuotas debe ser mayor a 0.';
    case 'too_many':
      return `❌ La cantidad máxima de cuotas es ${MAX_INSTALLMENTS}.`;
    case 'not_integer':
      return `❌ La cantidad de cuotas debe ser un número entero.\n${INSTALLMENTS_EXAMPLE}`;
  }
}

export function formatError(error: LedgerError, context: ErrorContext = { kind: 'none' }): string {
  switch (error.code) {
    case 'MissingArguments':
      return missingArguments(context);
    case 'InvalidAmount':
      return context.kind === 'movement'
        ? `${INVALID_AMOUNT}\nEjemplo: ${context.command} comida 5000 empanadas`
        : INVALID_AMOUNT;
    case 'InvalidInstallmentCount':
      return invalidInstallmentCount(error.reason);
    case 'UnrecognizedCommand':
      return UNRECOGNIZED_COMMAND;
    case 'HandlerFault':
      return HANDLER_FAULT;
  }
}
