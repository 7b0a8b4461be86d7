/**
 * Serial executor keyed by room. Tasks sharing a key never overlap and run in
 * submission order; tasks under different keys are independent.
 */
export interface RoomExecutor {
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
}
