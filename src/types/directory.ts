export type DirectoryKind = 'driver' | 'worker' | 'ship';

export type DirectoryStatus = 'active' | 'archived';

export type DirectoryItem = {
  id: number;
  name: string;
};

export type UserProfile = {
  userId: number;
  lastName: string;
  firstName: string;
  middleName: string;
  fullName: string;
  compactName: string;
  closedShifts: number;
  status: DirectoryStatus;
};

export type Registration = {
  userId: number;
  lastName: string;
  firstName: string;
  middleName: string;
};

export const toDirectoryItems = (names: string[]): DirectoryItem[] =>
  names.map((name, index) => ({ id: index + 1, name }));
