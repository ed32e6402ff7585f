/**
 * Audio System
 *
 * Collects audio intents during simulation. Every call appends exactly one
 * command; nothing is played here and nothing reads playback state back.
 * The host drains the buffer once per frame with consumeCommands().
 *
 * Values are sanitized on the way in: volume to 0..1, pan to -1..1, pitch
 * to at least 0.1, fade to at least 0. Non-finite numbers take the
 * parameter's default first.
 */

import type {
  AudioChannel,
  AudioCommand,
  AudioCommandType,
  Seconds,
  SoundId,
} from "@kinetica/contracts";
import { AudioChannels, createAudioCommand } from "@kinetica/contracts";
import { clamp, finiteOr } from "../math/scalar";
import { CommandBuffer } from "../commands/CommandBuffer";

const MIN_PITCH = 0.1;

export interface PlayOptions {
  /** @default 1 */
  volume?: number;
  /** @default 1 */
  pitch?: number;
  /** @default 0 */
  pan?: number;
}

export interface ChannelPlayOptions extends PlayOptions {
  /** @default false */
  loops?: boolean;
  /** @default 0 */
  fadeDuration?: Seconds;
}

export interface FadeOptions {
  /** @default 1 */
  volume?: number;
  /** @default 0 */
  fadeDuration?: Seconds;
}

function sanitizeVolume(volume: number | undefined, fallback = 1): number {
  return clamp(finiteOr(volume ?? fallback, fallback), 0, 1);
}

function sanitizePan(pan: number | undefined): number {
  return clamp(finiteOr(pan ?? 0, 0), -1, 1);
}

function sanitizePitch(pitch: number | undefined): number {
  return Math.max(MIN_PITCH, finiteOr(pitch ?? 1, 1));
}

function sanitizeFade(fade: number | undefined): number {
  return Math.max(0, finiteOr(fade ?? 0, 0));
}

export class AudioSystem {
  private readonly buffer = new CommandBuffer<AudioCommand>();

  // === Sound effects ===

  /** One-shot on the overlapping SFX channel. */
  play(soundId: SoundId, options: PlayOptions = {}): void {
    this.append("play", {
      soundId,
      channel: AudioChannels.SFX,
      volume: sanitizeVolume(options.volume),
      pitch: sanitizePitch(options.pitch),
      pan: sanitizePan(options.pan),
    });
  }

  // === Music ===

  /** Loops on the music channel, replacing the current track. */
  playMusic(soundId: SoundId, options: FadeOptions = {}): void {
    this.append("play", {
      soundId,
      channel: AudioChannels.MUSIC,
      volume: sanitizeVolume(options.volume),
      loops: true,
      fadeDuration: sanitizeFade(options.fadeDuration),
    });
  }

  stopMusic(fadeDuration: Seconds = 0): void {
    this.stop(AudioChannels.MUSIC, fadeDuration);
  }

  setMusicVolume(volume: number, fadeDuration: Seconds = 0): void {
    this.setVolume(volume, AudioChannels.MUSIC, fadeDuration);
  }

  // === Ambient ===

  playAmbient(soundId: SoundId, options: FadeOptions = {}): void {
    this.append("play", {
      soundId,
      channel: AudioChannels.AMBIENT,
      volume: sanitizeVolume(options.volume),
      loops: true,
      fadeDuration: sanitizeFade(options.fadeDuration),
    });
  }

  stopAmbient(fadeDuration: Seconds = 0): void {
    this.stop(AudioChannels.AMBIENT, fadeDuration);
  }

  // === Generic channel control ===

  playOnChannel(soundId: SoundId, channel: AudioChannel, options: ChannelPlayOptions = {}): void {
    this.append("play", {
      soundId,
      channel: sanitizeChannel(channel),
      volume: sanitizeVolume(options.volume),
      pitch: sanitizePitch(options.pitch),
      pan: sanitizePan(options.pan),
      loops: options.loops ?? false,
      fadeDuration: sanitizeFade(options.fadeDuration),
    });
  }

  stop(channel: AudioChannel, fadeDuration: Seconds = 0): void {
    this.append("stop", {
      channel: sanitizeChannel(channel),
      volume: 0,
      fadeDuration: sanitizeFade(fadeDuration),
    });
  }

  setVolume(volume: number, channel: AudioChannel, fadeDuration: Seconds = 0): void {
    this.append("setVolume", {
      channel: sanitizeChannel(channel),
      volume: sanitizeVolume(volume),
      fadeDuration: sanitizeFade(fadeDuration),
    });
  }

  stopAll(fadeDuration: Seconds = 0): void {
    this.append("stopAll", { volume: 0, fadeDuration: sanitizeFade(fadeDuration) });
  }

  // === Master control ===

  setMasterVolume(volume: number): void {
    this.append("setMasterVolume", { volume: sanitizeVolume(volume) });
  }

  pauseAll(): void {
    this.append("pauseAll", { volume: 0 });
  }

  resumeAll(): void {
    this.append("resumeAll", { volume: 0 });
  }

  // === Frame handoff ===

  /** Drops anything left over from the previous frame. */
  beginFrame(): void {
    this.buffer.clear();
  }

  /** Returns this frame's commands in emission order and empties the buffer. */
  consumeCommands(): readonly AudioCommand[] {
    return this.buffer.drain();
  }

  /** Peek without consuming. */
  get commands(): readonly AudioCommand[] {
    return this.buffer.commands;
  }

  get hasCommands(): boolean {
    return !this.buffer.isEmpty;
  }

  private append(type: AudioCommandType, fields: Partial<Omit<AudioCommand, "type">>): void {
    this.buffer.append(createAudioCommand(type, fields));
  }
}

/** Channels are small non-negative integers. */
function sanitizeChannel(channel: AudioChannel): AudioChannel {
  if (!Number.isFinite(channel)) return AudioChannels.SFX;
  return Math.max(0, Math.floor(channel));
}
