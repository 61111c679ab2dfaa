export { healthService, HealthService } from './health.service';
export { categorizationService, CategorizationService } from './categorization.service';
export * from './categorization.service';
