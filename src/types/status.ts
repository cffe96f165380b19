export type StatusSeverity = 'success' | 'warning' | 'error' | 'abort' | 'info' | 'none';

export interface StatusInfo {
  id: string;
  text: string;
  severity: StatusSeverity;
  number: string;
  isPopup: boolean;
  parameter: string;
}
