export type Team = "red" | "blue";

export type Vec3 = [number, number, number];

export type LogTone = "good" | "warn" | "bad" | "";

export const DISCRETE_ACTION = {
  idle: 0,
  fireGun: 1,
  fireMissile: 2,
  deployFlare: 3,
  boost: 4,
} as const;

export interface DroneAction {
  discrete: number;
  /** throttle, pitch rate, yaw rate, roll rate */
  continuous: ReadonlyArray<number>;
}

export type ActionMap = Readonly<Record<string, DroneAction>>;

export interface DroneState {
  id: string;
  handle: number;
  team: Team;
  position: Vec3;
  velocity: Vec3;
  /** roll, pitch, yaw */
  orientation: Vec3;
  hp: number;
  shield: number;
  energy: number;
  ammo: number;
  missiles: number;
  alive: boolean;
  boosting: boolean;
  missileCooldown: number;
  flareCooldown: number;
  damageDealt: number;
  damageTaken: number;
  kills: number;
}

export type DroneEventKind = "fire-gun" | "fire-missile" | "deploy-flare";

export interface DroneEvent {
  kind: DroneEventKind;
  droneId: string;
}

export type ProjectileKind = "bullet" | "missile";

export interface ProjectileState {
  id: string;
  kind: ProjectileKind;
  ownerId: string;
  ownerTeam: Team;
  position: Vec3;
  velocity: Vec3;
  damage: number;
  lifetime: number;
  /** Homing lock; always null for bullets. */
  targetId: string | null;
  tracking: number;
}

export interface FlareState {
  id: string;
  ownerId: string;
  position: Vec3;
  lifetime: number;
  radius: number;
}

export interface HitEvent {
  kind: "hit" | "kill";
  attackerId: string;
  targetId: string;
  damage: number;
  projectileKind: ProjectileKind;
}

export interface RewardWeights {
  damageReward: number;
  killReward: number;
  damagePenalty: number;
  deathPenalty: number;
  survivalReward: number;
}

export interface CombatConfig {
  teamSize: number;
  mapBounds: readonly [number, number];
  mapHeight: readonly [number, number];
  tickSeconds: number;
  maxSteps: number;
  rewards: RewardWeights;
  bulletHitRadius: number;
  missileHitRadius: number;
  seed: number;
}

export type CombatConfigInput = Partial<Omit<CombatConfig, "rewards">> & {
  rewards?: Partial<RewardWeights>;
};

export type WorldPhase = "uninitialized" | "ready" | "running" | "finished";

export interface EpisodeInfo {
  step: number;
  redAlive: number;
  blueAlive: number;
  winner: Team | null;
}

export type ObservationMap = Record<string, Float32Array>;

export interface ResetResult {
  observations: ObservationMap;
  info: EpisodeInfo;
}

export interface StepResult {
  observations: ObservationMap;
  rewards: Record<string, number>;
  terminated: Record<string, boolean>;
  truncated: Record<string, boolean>;
  info: EpisodeInfo;
}

export interface DroneSnapshot {
  id: string;
  team: Team;
  position: Vec3;
  velocity: Vec3;
  orientation: Vec3;
  hp: number;
  shield: number;
  isAlive: boolean;
}

export interface ProjectileSnapshot {
  id: string;
  position: Vec3;
}

export interface RenderSnapshot {
  step: number;
  drones: DroneSnapshot[];
  projectiles: ProjectileSnapshot[];
}

export interface DroneStats {
  id: string;
  team: Team;
  hp: number;
  shield: number;
  energy: number;
  ammo: number;
  missiles: number;
  isAlive: boolean;
  damageDealt: number;
  damageTaken: number;
  kills: number;
}
