export { createServices, type Services } from './services.js';
export { createDashboard, sendError, type DashboardDeps } from './dashboard.js';
