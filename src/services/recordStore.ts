import type { DirectoryKind, DirectoryStatus, Registration, UserProfile } from '../types/directory.js';
import type { RowReference, SectionWrite, ShiftProgress, ShiftSummary } from '../types/shift.js';

/**
 * Spreadsheet-backed storage for shifts, directories and user profiles.
 * Failures surface as ExternalServiceError; registration conflicts as DuplicateError.
 */
export interface RecordStore {
  findRow(userId: number): Promise<RowReference | null>;
  /** Finds today's row for the user or appends a new one. */
  openRow(userId: number): Promise<RowReference>;
  readProgress(row: RowReference): Promise<ShiftProgress>;
  readSummary(row: RowReference): Promise<ShiftSummary>;
  writeSection(row: RowReference, write: SectionWrite): Promise<void>;
  /** Returns true only for the call that actually closed the shift. */
  markClosed(row: RowReference, closedAt: Date): Promise<boolean>;
  listActive(kind: DirectoryKind): Promise<string[]>;
  addEntry(kind: DirectoryKind, name: string): Promise<void>;
  getStatus(kind: DirectoryKind, name: string): Promise<DirectoryStatus | null>;
  findUser(userId: number): Promise<UserProfile | null>;
  registerUser(registration: Registration): Promise<UserProfile>;
}
