/**
 * Terminal output
 */

export {
  type DashboardEvent,
  type DashboardHandle,
  type DashboardOptions,
  renderDashboard,
} from './ui.tsx';
