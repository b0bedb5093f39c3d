// Location of the maintenance document in S3
export interface StorageLocation {
  bucket: string;
  key: string;
}

// Configuration resolved from the environment at cold start
export interface MaintenanceConfig {
  maintenanceMode: boolean;
  storage: StorageLocation;
  specialPrefix: string; // empty disables special routing
  downstreamRef: string; // function name or ARN, empty disables special routing
  retryAfter: string; // empty omits the Retry-After header
  storageTimeoutMs: number;
  downstreamTimeoutMs: number;
}
