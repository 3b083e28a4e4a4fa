import express, { type Response } from 'express';
import { z } from 'zod';
import {
  InvalidRequestError,
  NoSlotAvailableError,
  TASK_STATUSES,
  errorMessage,
  type Logger,
  type PolicyTable,
} from '@vidfarm/shared';
import { formatSlot, parsePublishRequest, type PublishScheduler, type TaskStore } from '@vidfarm/publisher';

/** Express API over the scheduling engine: admission, queue inspection, and status
 * transitions for upload workers running out of process. */

export interface DashboardDeps {
  scheduler: PublishScheduler;
  store: TaskStore;
  policies: PolicyTable;
}

const statusUpdateSchema = z.object({
  status: z.enum(TASK_STATUSES),
  error: z.string().optional(),
});

export function sendError(res: Response, err: unknown, logger: Logger): void {
  if (err instanceof InvalidRequestError) {
    res.status(400).json({ error: err.message, code: err.code, fields: err.fields });
    return;
  }
  if (err instanceof NoSlotAvailableError) {
    res.status(409).json({ error: err.message, code: err.code });
    return;
  }

  logger.error({ error: errorMessage(err) }, 'Request failed');
  const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : 'INTERNAL';
  res.status(500).json({ error: errorMessage(err), code });
}

export function createDashboard(deps: DashboardDeps, logger: Logger, port = 3000) {
  const { scheduler, store, policies } = deps;
  const app = express();
  app.use(express.json());

  // ─── Health ───

  app.get('/health', async (_req, res) => {
    try {
      res.json({
        status: 'ok',
        uptime: process.uptime(),
        tasks: await store.count(),
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      res.status(500).json({ status: 'error', error: errorMessage(err) });
    }
  });

  // ─── Platform Policies ───

  app.get('/api/platforms', (_req, res) => {
    const platforms = [...policies.entries()].map(([name, policy]) => ({
      name,
      weekdaySlots: policy.weekdaySlots.map(formatSlot),
      weekendSlots: policy.weekendSlots.map(formatSlot),
      minIntervalSeconds: policy.minIntervalSeconds,
      maxDaily: policy.maxDaily,
    }));
    res.json({ platforms });
  });

  // ─── Scheduling ───

  app.post('/api/schedule', async (req, res) => {
    try {
      const request = parsePublishRequest(req.body);
      const result = await scheduler.schedule(request);
      res.status(201).json({ ...result, scheduledTime: result.scheduledTime.toISOString() });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ─── Queue ───

  app.get('/api/tasks/pending', async (req, res) => {
    try {
      const platform = typeof req.query.platform === 'string' ? req.query.platform : undefined;
      const tasks = await scheduler.getPendingTasks(platform);
      res.json({ tasks, total: tasks.length });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  app.post('/api/tasks/:id/status', async (req, res) => {
    try {
      const id = Number(req.params.id);
      if (!Number.isInteger(id) || id < 1) {
        throw new InvalidRequestError(`Invalid task id: ${req.params.id}`, ['id']);
      }

      const parsed = statusUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidRequestError(
          `Invalid status update: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
          parsed.error.issues.map((i) => i.path.join('.')),
        );
      }

      const updated = await store.updateStatus(id, parsed.data.status, parsed.data.error ?? null);
      if (!updated) {
        res.status(404).json({ error: `Task ${id} not found`, code: 'NOT_FOUND' });
        return;
      }

      logger.info({ taskId: id, status: parsed.data.status }, 'Task status updated');
      res.json({ id, status: parsed.data.status });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  const server = app.listen(port, () => {
    logger.info({ port }, 'Dashboard API running');
  });

  return server;
}
