import type { DroneState, Team } from "../../types.ts";

/**
 * Fixed-capacity drone storage. Handles are slot indices assigned in
 * insertion order; iteration always follows that order.
 */
export class DroneArena {
  private readonly slots: DroneState[];
  private readonly handleById: Map<string, number>;
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
    this.slots = [];
    this.handleById = new Map();
  }

  public nextHandle(): number {
    return this.slots.length;
  }

  public insert(drone: DroneState): void {
    if (this.slots.length >= this.capacity) {
      throw new Error(`drone arena is full (capacity ${this.capacity})`);
    }
    if (this.handleById.has(drone.id)) {
      throw new Error(`duplicate drone id: ${drone.id}`);
    }
    if (drone.handle !== this.slots.length) {
      throw new Error(`drone ${drone.id} carries handle ${drone.handle}, expected ${this.slots.length}`);
    }
    this.handleById.set(drone.id, drone.handle);
    this.slots.push(drone);
  }

  public byHandle(handle: number): DroneState | null {
    return this.slots[handle] ?? null;
  }

  public byId(id: string): DroneState | null {
    const handle = this.handleById.get(id);
    return handle === undefined ? null : this.byHandle(handle);
  }

  public all(): ReadonlyArray<DroneState> {
    return this.slots;
  }

  public ids(): string[] {
    return this.slots.map((drone) => drone.id);
  }

  public living(): DroneState[] {
    return this.slots.filter((drone) => drone.alive);
  }

  public livingOnTeam(team: Team): DroneState[] {
    return this.slots.filter((drone) => drone.alive && drone.team === team);
  }

  public livingEnemiesOf(team: Team): DroneState[] {
    return this.slots.filter((drone) => drone.alive && drone.team !== team);
  }
}
