import { parseAmount } from '../domain/computations.js';
import { MAX_INSTALLMENTS } from '../domain/installments.js';
import { fail, ok, type Result } from '../domain/types.js';

export interface ParsedCommand {
  command: string;   // e.g. "/gasto", bot suffix removed
  args: string[];
}

export interface MovementArgs {
  category: string;
  amount: number;
  description: string;
}

export interface InstallmentArgs extends MovementArgs {
  count: number;
}

export interface KeyedAmountArgs {
  key: string;
  amount: number;
}

/**
 * Split a chat message into command and arguments.
 * Returns null for empty text. "/gasto@MyBot x" → { command: "/gasto", args: ["x"] }
 */
export function parseCommand(text: string | undefined | null): ParsedCommand | null {
  const parts = (text ?? '').trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length === 0) return null;

  const [head, ...args] = parts;
  const at = head.indexOf('@');
  const command = at >= 0 ? head.slice(0, at) : head;
  return { command, args };
}

/** category amount [description...] */
export function parseMovementArgs(args: string[]): Result<MovementArgs> {
  if (args.length < 2) return fail({ code: 'MissingArguments' });

  const amount = parseAmount(args[1]);
  if (!amount.ok) return amount;

  return ok({
    category: args[0],
    amount: amount.value,
    description: args.slice(2).join(' '),
  });
}

/** category amount [description...] count — the count is always the last token */
export function parseInstallmentArgs(args: string[]): Result<InstallmentArgs> {
  if (args.length < 3) return fail({ code: 'MissingArguments' });

  const amount = parseAmount(args[1]);
  if (!amount.ok) return amount;

  const countToken = args[args.length - 1];
  if (!/^[+-]?\d+$/.test(countToken)) {
    return fail({ code: 'InvalidInstallmentCount', token: countToken, reason: 'not_integer' });
  }
  const count = Number.parseInt(countToken, 10);
  if (count <= 0) {
    return fail({ code: 'InvalidInstallmentCount', token: countToken, reason: 'not_positive' });
  }
  if (count > MAX_INSTALLMENTS) {
    return fail({ code: 'InvalidInstallmentCount', token: countToken, reason: 'too_many' });
  }

  return ok({
    category: args[0],
    amount: amount.value,
    description: args.slice(2, -1).join(' '),
    count,
  });
}

/** key amount — used by /presupuesto and /objetivo */
export function parseKeyedAmountArgs(args: string[]): Result<KeyedAmountArgs> {
  if (args.length < 2) return fail({ code: 'MissingArguments' });

  const amount = parseAmount(args[1]);
  if (!amount.ok) return amount;

  return ok({ key: args[0], amount: amount.value });
}
