/**
 * Mackerel Module
 *
 * Exports for reading monitors and alerts from the Mackerel API.
 */

export {
  MackerelClient,
  type AlertSource,
  type MackerelClientConfig,
} from "./client.js";

export {
  alertSchema,
  alertPageSchema,
  monitorSchema,
  monitorListSchema,
  type Alert,
  type AlertPage,
  type AlertQuery,
  type Monitor,
} from "./types.js";
