import { z } from 'zod';
import { TaskStatus } from '../types/task-status.js';

const isoTimestamp = z.string().refine(s => !Number.isNaN(Date.parse(s)), {
  message: 'Expected an ISO-8601 timestamp',
});

/** Shape of one persisted task. Key order here is the key order on disk. */
export const taskSchema = z.object({
  id: z.number().int().positive(),
  description: z.string().min(1),
  status: z.enum([TaskStatus.Todo, TaskStatus.InProgress, TaskStatus.Done]),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
});

export const taskFileSchema = z.array(taskSchema).superRefine((tasks, ctx) => {
  const seen = new Set<number>();
  tasks.forEach((task, index) => {
    if (seen.has(task.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate task id ${task.id}`,
      });
    }
    seen.add(task.id);
  });
});

export type TaskRecord = z.infer<typeof taskSchema>;
