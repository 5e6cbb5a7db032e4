export interface StateAccessReport {
  location: string;
  exists: boolean;
  ownerUid?: number;
  mode?: number;
}

export interface StateReader {
  getLocation(): string;
  verifyAccess(): Promise<StateAccessReport>;
  read(): Promise<string | null>;
}

export interface StateWriter {
  /** Creates an empty state when none exists. Resolves true when it created one. */
  initialize(): Promise<boolean>;
  write(content: string): Promise<void>;
}

export interface RotationStateStore extends StateReader, StateWriter {}
