import { z } from 'zod';
import { ValidationError } from './errors';

export const parseWith = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  throw new ValidationError(`${where}${issue ? issue.message : 'Invalid input'}`, {
    fields: result.error.flatten().fieldErrors,
    formErrors: result.error.flatten().formErrors
  });
};

/** Route params such as `:id` must be positive integers. */
export const parseId = (raw: string): number => {
  const id = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid id '${raw}'`);
  }
  return id;
};
