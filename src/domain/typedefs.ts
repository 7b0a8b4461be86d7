/**
 * Core domain typedefs used throughout the orchestrator.
 * These are simple aliases for now; they can later evolve into
 * branded types for stronger compile-time safety.
 */

/** Unique identifier of a room */
export type RoomId = string;

/** Six-character join-code handed out to players */
export type RoomCode = string;

/** Unique identifier of a player, stable across rooms */
export type PlayerId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Status of a player within the current round */
export type PlayerStatus = "connected" | "playing" | "completed" | "eliminated";

/** Lifecycle status of a room */
export type RoomStatus = "waiting" | "playing" | "finished";

/** Visibility of a room */
export type RoomKind = "public" | "private";

/** Why a player was taken out of contention */
export type EliminationReason = "errors" | "timeout";
