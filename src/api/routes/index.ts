export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { updatesRoutes } from './updates';
