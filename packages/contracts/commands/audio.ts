/**
 * Audio intents emitted by the simulation and played by an external backend.
 *
 * The command stream is one-way: nothing here reads playback state back.
 * Commands must be processed in order. On an exclusive channel (>= 1) a
 * `play` replaces whatever that channel is playing.
 */

/** Numeric sound handle resolved by the audio backend */
export type SoundId = number;

/** 0 = overlapping sound effects; 1 and up are exclusive channels */
export type AudioChannel = number;

export const AudioChannels = {
  SFX: 0,
  MUSIC: 1,
  AMBIENT: 2,
  VOICE: 3,
} as const;

export type AudioCommandType =
  | "play"
  | "stop"
  | "setVolume"
  | "stopAll"
  | "setMasterVolume"
  | "pauseAll"
  | "resumeAll";

export interface AudioCommand {
  type: AudioCommandType;
  /** 0 for commands that do not name a sound */
  soundId: SoundId;
  channel: AudioChannel;
  /** 0..1 */
  volume: number;
  /** Playback rate multiplier, >= 0.1 */
  pitch: number;
  /** -1 (left) .. 1 (right) */
  pan: number;
  loops: boolean;
  /** Seconds, >= 0 */
  fadeDuration: number;
}

export function createAudioCommand(
  type: AudioCommandType,
  fields: Partial<Omit<AudioCommand, "type">> = {}
): AudioCommand {
  return {
    type,
    soundId: 0,
    channel: AudioChannels.SFX,
    volume: 1,
    pitch: 1,
    pan: 0,
    loops: false,
    fadeDuration: 0,
    ...fields,
  };
}
