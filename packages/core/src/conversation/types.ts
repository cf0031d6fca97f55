export interface LogRecord {
  readonly timestamp: Date; // whole seconds
  readonly input: string; // normalized
  readonly output: string;
}

export type Clock = () => Date;
export type LineWriter = (line: string) => void;
