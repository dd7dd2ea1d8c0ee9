// Shared type definitions for the navigation host

export interface EntityRef {
  index: number;
  generation: number;
}

export interface LevelInfo {
  name: string;
  width: number;
  height: number;
  cellSize: number;
  origin: { x: number; z: number };
  rows: string[];
}

export interface AgentState {
  entity: EntityRef;
  name: string | null;
  position: { x: number; z: number };
  yaw: number;
  state: "idle" | "navigating" | "recalculating" | "stuck";
  path: { x: number; y: number }[];
  currentIndex: number;
  explored?: { x: number; y: number }[];
}

export type TargetRequest =
  | { entity: EntityRef; cell: { x: number; y: number } }
  | { entity: EntityRef; position: { x: number; z: number } };

// Client → Server messages
export interface ClientToServerEvents {
  "nav:set-target": (data: TargetRequest) => void;
  "nav:clear-target": (data: { entity: EntityRef }) => void;
  "bot:spawn": (data: { name?: string; position: { x: number; z: number } }) => void;
  "bot:despawn": (data: { entity: EntityRef }) => void;
}

// Server → Client messages
export interface ServerToClientEvents {
  "welcome": (data: { level: LevelInfo; agents: AgentState[] }) => void;
  "nav:state": (data: { agents: AgentState[]; tick: number; timestamp: number }) => void;
  "bot:spawned": (data: { entity: EntityRef; name: string | null }) => void;
  "bot:despawned": (data: { entity: EntityRef }) => void;
  "nav:rejected": (data: { reason: string }) => void;
}
