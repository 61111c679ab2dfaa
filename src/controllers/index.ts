export { healthController, HealthController } from './health.controller';
export { categorizationController, CategorizationController } from './categorization.controller';
