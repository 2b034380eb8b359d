/**
 * Zod schemas for payloads returned by the test management API.
 * Unknown properties pass through; only the fields we read are checked.
 */

import { z } from 'zod';
import { TEST_OUTCOMES } from '../types/outcome.js';

export const remoteIdSchema = z.union([z.number(), z.string()]);

const referenceSchema = z
  .object({
    id: remoteIdSchema.optional(),
    name: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const identitySchema = z
  .object({
    displayName: z.string().optional(),
  })
  .passthrough();

/** Test point as returned by `test/Plans/{plan}/Suites/{suite}/points` */
export const rawTestPointSchema = z
  .object({
    id: z.number().int(),
    testCase: referenceSchema.optional(),
    configuration: referenceSchema.optional(),
    state: z.string().optional(),
    outcome: z.string().optional(),
    lastTestRun: referenceSchema.optional(),
    lastResult: referenceSchema.optional(),
    assignedTo: identitySchema.optional(),
    isAutomated: z.boolean().optional(),
    suiteId: remoteIdSchema.optional(),
    testPlan: referenceSchema.optional(),
  })
  .passthrough();

/** Test suite as returned by `testplan/Plans/{plan}/suites` */
export const rawTestSuiteSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    suiteType: z.string().optional(),
    parentSuite: referenceSchema.optional(),
    plan: referenceSchema.optional(),
  })
  .passthrough();

/** Work item as returned by `wit/workitems/{id}` */
export const rawWorkItemSchema = z
  .object({
    id: remoteIdSchema,
    fields: z.record(z.unknown()).default({}),
    _links: z
      .object({
        html: z.object({ href: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Collection envelope `{ count, value: [...] }` */
export function listResponseSchema<T extends z.ZodTypeAny>(item: T) {
  return z
    .object({
      count: z.number().optional(),
      value: z.array(item).default([]),
    })
    .passthrough();
}

export const testOutcomeSchema = z.enum(TEST_OUTCOMES);

export type RawTestPoint = z.infer<typeof rawTestPointSchema>;
export type RawTestSuite = z.infer<typeof rawTestSuiteSchema>;
export type RawWorkItem = z.infer<typeof rawWorkItemSchema>;
