export type RiderId = number;

export interface Rider {
  id: RiderId;
}
