export type { IInstanceEventRepository } from "./audit-log-repository.js";
export { DEFAULT_LIMIT, DrizzleInstanceEventRepository, MAX_LIMIT } from "./audit-log-repository.js";
export type { InstanceEventAction, InstanceEventFilters, InstanceEventInput, InstanceEventRow } from "./events.js";
export { INSTANCE_EVENT_ACTIONS } from "./events.js";
export type { AuditSink } from "./instance-audit-log.js";
export { BufferedAuditSink, InstanceAuditLog } from "./instance-audit-log.js";
