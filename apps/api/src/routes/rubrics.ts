import { Hono } from 'hono';
import { extractRubricSchema } from '../grading/rubric.js';
import { serializeRubric } from '../utils/serialize.js';
import { rubricBodySchema } from './schemas.js';
import { parseBody } from './validation.js';

export const rubricsRoutes = new Hono();

rubricsRoutes.post('/extract', async (c) => {
  const { text } = await parseBody(c, rubricBodySchema);
  const rubric = await extractRubricSchema(text);
  return c.json(serializeRubric(rubric));
});
