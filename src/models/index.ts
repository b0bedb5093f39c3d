export * from './MaintenanceConfig';
export * from './MaintenanceRequest';
export * from './MaintenanceResponse';
