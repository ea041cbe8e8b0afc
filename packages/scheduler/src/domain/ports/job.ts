export type JobFunction = () => void | Promise<void>;

export interface Job {
  run(): void | Promise<void>;
}
