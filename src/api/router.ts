/**
 * Command router: one chat message in, at most one reply out.
 *
 * Handlers return text. Argument problems come back as tagged errors and are
 * formatted here; anything a handler throws (store I/O) is logged and answered
 * with the generic fault reply, so the next message is unaffected.
 */
import { currentMonth, startOfDay } from '../domain/computations.js';
import type { Currency, MovementKind } from '../domain/types.js';
import type { LedgerRepo } from '../db/repo.js';
import {
  parseCommand,
  parseInstallmentArgs,
  parseKeyedAmountArgs,
  parseMovementArgs,
} from './commandParser.js';
import {
  HANDLER_FAULT,
  formatBalance,
  formatBudgetSaved,
  formatBudgetStatus,
  formatError,
  formatGoalSaved,
  formatGoals,
  formatInstallments,
  formatMovementRecorded,
  formatSummary,
  formatUsage,
} from './formatter.js';

export interface InboundMessage {
  chatId: number;
  senderName?: string;
  text?: string | null;
}

interface HandlerContext {
  command: string;
  args: string[];
  user: string;
  now: Date;
}

type Handler = (ctx: HandlerContext) => Promise<string>;

export interface RouterDeps {
  repo: LedgerRepo;
  now?: () => Date;
  /** Used when the sender has no display name */
  defaultUserLabel?: string;
}

export interface CommandRouter {
  handle(message: InboundMessage): Promise<string | null>;
  readonly commands: readonly string[];
}

export function createCommandRouter({ repo, now = () => new Date(), defaultUserLabel = 'yo' }: RouterDeps): CommandRouter {
  const usage: Handler = async ({ user }) => formatUsage(user);

  const movement = (kind: MovementKind, currency: Currency): Handler => async ({ command, args, user }) => {
    const parsed = parseMovementArgs(args);
    if (!parsed.ok) return formatError(parsed.error, { kind: 'movement', command });

    const recorded = await repo.recordMovement({ kind, currency, user, ...parsed.value });
    return formatMovementRecorded(recorded);
  };

  const installments: Handler = async ({ args, user, now: at }) => {
    const parsed = parseInstallmentArgs(args);
    if (!parsed.ok) return formatError(parsed.error, { kind: 'installments' });

    const { category, amount, description, count } = parsed.value;
    const result = await repo.scheduleInstallments({
      category,
      totalAmount: amount,
      description,
      count,
      start: startOfDay(at),
      user,
    });
    if (!result.ok) return formatError(result.error, { kind: 'installments' });
    return formatInstallments(result.value);
  };

  const summary: Handler = async ({ now: at }) => {
    const period = currentMonth(at);
    return formatSummary(await repo.summarizeMonth(period), period);
  };

  const balance: Handler = async ({ now: at }) => formatBalance(await repo.summarizeMonth(currentMonth(at)));

  const budget: Handler = async ({ args }) => {
    const parsed = parseKeyedAmountArgs(args);
    if (!parsed.ok) return formatError(parsed.error, { kind: 'budget' });

    await repo.upsertBudget(parsed.value.key, parsed.value.amount);
    return formatBudgetSaved(parsed.value.key, parsed.value.amount);
  };

  const goal: Handler = async ({ args }) => {
    const parsed = parseKeyedAmountArgs(args);
    if (!parsed.ok) return formatError(parsed.error, { kind: 'goal' });

    await repo.upsertGoal(parsed.value.key, parsed.value.amount);
    return formatGoalSaved(parsed.value.key, parsed.value.amount);
  };

  const budgetStatus: Handler = async ({ now: at }) => {
    const period = currentMonth(at);
    return formatBudgetStatus(await repo.getBudgetStatus(period), period);
  };

  const goals: Handler = async () => formatGoals(await repo.listGoals());

  const handlers = new Map<string, Handler>([
    ['/start', usage],
    ['/help', usage],
    ['/gasto', movement('expense', 'ARS')],
    ['/gasto_usd', movement('expense', 'USD')],
    ['/ingreso', movement('income', 'ARS')],
    ['/ingreso_usd', movement('income', 'USD')],
    ['/cuotas', installments],
    ['/resumen', summary],
    ['/saldo', balance],
    ['/presupuesto', budget],
    ['/objetivo', goal],
    ['/presupuestos', budgetStatus],
    ['/objetivos', goals],
  ]);

  async function handle(message: InboundMessage): Promise<string | null> {
    const parsed = parseCommand(message.text);
    if (!parsed) return null;

    const handler = handlers.get(parsed.command);
    if (!handler) {
      return formatError({ code: 'UnrecognizedCommand', command: parsed.command });
    }

    try {
      return await handler({
        command: parsed.command,
        args: parsed.args,
        user: message.senderName?.trim() || defaultUserLabel,
        now: now(),
      });
    } catch (error) {
      console.error(`Error handling ${parsed.command} for chat ${message.chatId}:`, error);
      return HANDLER_FAULT;
    }
  }

  return { handle, commands: Array.from(handlers.keys()) };
}
