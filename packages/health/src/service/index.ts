export { InsightService, type InsightServiceDeps } from "./insight-service.js";
