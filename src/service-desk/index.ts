export { getServiceDeskConfig, ServiceDesk, EXPERIMENTAL_HEADERS, NO_CHECK_HEADERS, type ServiceDeskClientConfig, type ApprovalDecision } from "./client";
export { Insight, type IqlOptions, type InsightObjectChanges, type ObjectTypeChanges, type ObjectTypeAttributeOptions } from "./insight";
