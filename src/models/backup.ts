export interface BackupInfo {
  filename: string;
  path: string;
  /** `YYYYMMDDHHMMSS`, UTC. */
  timestamp: string;
  created_at: string;
  size_bytes: number;
}

export interface RestoreResult {
  success: true;
  restored_from: string;
  restored_at: string;
  safety_backup: string | null;
}
