import express from 'express';
import cors from 'cors';
import { currentMonth, parseMonthLabel } from '../../src/domain/computations.js';
import type { LedgerRepo } from '../../src/db/repo.js';
import type { CommandRouter } from '../../src/api/router.js';
import { toInboundMessage, type TelegramClient } from '../../src/api/telegram.js';

export interface AppDeps {
  repo: LedgerRepo;
  router: CommandRouter;
  telegram: TelegramClient;
  /** Secret path segment Telegram posts updates to */
  webhookToken: string;
  now?: () => Date;
}

export function createApp({ repo, router, telegram, webhookToken, now = () => new Date() }: AppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // POST /webhook/:token - Telegram update
  app.post('/webhook/:token', async (req, res) => {
    if (req.params.token !== webhookToken) {
      res.status(404).json({ error: 'Not found' });
      return;
    }

    try {
      const message = toInboundMessage(req.body);
      if (message) {
        const reply = await router.handle(message);
        if (reply !== null) {
          await telegram.sendMessage(message.chatId, reply);
        }
      }
      res.send('OK');
    } catch (error) {
      console.error('Error handling update:', error);
      res.status(500).json({ error: 'Failed to handle update' });
    }
  });

  // GET /summary?month=YYYY-MM - ARS totals, current month by default
  app.get('/summary', async (req, res) => {
    try {
      const label = typeof req.query.month === 'string' ? req.query.month : undefined;
      const period = label === undefined ? currentMonth(now()) : parseMonthLabel(label);
      if (!period) {
        res.status(400).json({ error: 'month query parameter must be YYYY-MM' });
        return;
      }

      const totals = await repo.summarizeMonth(period);
      res.json({
        year: period.year,
        month: period.month,
        currency: 'ARS',
        income: totals.income,
        expense: totals.expense,
        balance: totals.income - totals.expense,
        excluded_foreign: totals.excludedForeign,
        skipped: totals.skipped,
      });
    } catch (error) {
      console.error('Error computing summary:', error);
      res.status(500).json({ error: 'Failed to compute summary' });
    }
  });

  // GET /movements
  app.get('/movements', async (_req, res) => {
    try {
      res.json(await repo.listMovements());
    } catch (error) {
      console.error('Error fetching movements:', error);
      res.status(500).json({ error: 'Failed to fetch movements' });
    }
  });

  // GET /budgets
  app.get('/budgets', async (_req, res) => {
    try {
      res.json(await repo.listBudgets());
    } catch (error) {
      console.error('Error fetching budgets:', error);
      res.status(500).json({ error: 'Failed to fetch budgets' });
    }
  });

  // GET /goals
  app.get('/goals', async (_req, res) => {
    try {
      res.json(await repo.listGoals());
    } catch (error) {
      console.error('Error fetching goals:', error);
      res.status(500).json({ error: 'Failed to fetch goals' });
    }
  });

  return app;
}
