// Response shape expected by the ALB Lambda target integration
export interface MaintenanceResponse {
  statusCode: number;
  statusDescription: string;
  isBase64Encoded: boolean;
  headers: Record<string, string>;
  multiValueHeaders?: Record<string, string[]>; // only when the target group has them enabled
  body: string;
}
