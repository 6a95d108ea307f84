/**
 * Field-level validation failure, reported for requests and configuration
 */
export interface ValidationError {
  field: string;
  message: string;
  code: string;
}
