/**
 * Mackerel API response schemas
 *
 * Only the fields the exporter reads are declared; others are stripped.
 */

import { z } from "zod";

export const alertSchema = z.object({
  id: z.string(),
  status: z.string(),
  monitorId: z.string().optional(),
  type: z.string(),
  message: z.string().optional(),
  reason: z.string().optional(),
  openedAt: z.number().int(),
  closedAt: z.number().int().nullable().optional(),
});

export const alertPageSchema = z.object({
  alerts: z.array(alertSchema),
  nextId: z.string().optional(),
});

export const monitorSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  url: z.string().optional(),
  service: z.string().optional(),
});

export const monitorListSchema = z.object({
  monitors: z.array(monitorSchema),
});

/** One alert occurrence */
export type Alert = z.infer<typeof alertSchema>;

/** One page of GET /api/v0/alerts */
export type AlertPage = z.infer<typeof alertPageSchema>;

/** A monitor definition */
export type Monitor = z.infer<typeof monitorSchema>;

/**
 * Query for the alert listing
 */
export interface AlertQuery {
  /** Window start, epoch seconds */
  from: number;
  /** Window end, epoch seconds */
  to: number;
  /** Alerts per page */
  pageSize?: number;
}
