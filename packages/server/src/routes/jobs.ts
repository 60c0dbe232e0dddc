import { Hono } from 'hono';
import { NotFoundError } from '../lib/errors.js';
import type { AppBindings } from '../app-context.js';

const jobs = new Hono<AppBindings>()
  // Get the status of a dispatched job
  .get('/:id', async (c) => {
    const { dispatcher } = c.get('appContext');
    const job = await dispatcher.lookup(c.req.param('id'));

    if (!job) {
      throw new NotFoundError('Job');
    }

    return c.json(job);
  });

export { jobs };
