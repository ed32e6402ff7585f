/**
 * Audio Channel Ledger
 *
 * An AudioCommandConsumer that plays nothing: it folds the command stream
 * into the state a backend would hold after processing it. Exclusive
 * channels keep a single occupant; the SFX channel only counts one-shots.
 */

import type {
  AudioChannel,
  AudioCommand,
  AudioCommandConsumer,
  SoundId,
} from "@kinetica/contracts";
import { AudioChannels } from "@kinetica/contracts";

export interface ChannelOccupant {
  soundId: SoundId;
  volume: number;
  loops: boolean;
  paused: boolean;
}

export class AudioChannelLedger implements AudioCommandConsumer {
  readonly id = "audio-channel-ledger";

  private occupants = new Map<AudioChannel, ChannelOccupant>();
  private oneShots = new Map<SoundId, number>();
  private master = 1;
  private paused = false;

  process(commands: readonly AudioCommand[]): void {
    for (const command of commands) {
      this.apply(command);
    }
  }

  /** What an exclusive channel is playing, or null. */
  occupant(channel: AudioChannel): ChannelOccupant | null {
    const current = this.occupants.get(channel);
    return current === undefined ? null : { ...current };
  }

  /** How many times `soundId` was fired on the SFX channel. */
  sfxCount(soundId: SoundId): number {
    return this.oneShots.get(soundId) ?? 0;
  }

  get activeChannels(): AudioChannel[] {
    return [...this.occupants.keys()].sort((a, b) => a - b);
  }

  get masterVolume(): number {
    return this.master;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  reset(): void {
    this.occupants.clear();
    this.oneShots.clear();
    this.master = 1;
    this.paused = false;
  }

  private apply(command: AudioCommand): void {
    switch (command.type) {
      case "play":
        if (command.channel === AudioChannels.SFX) {
          this.oneShots.set(command.soundId, this.sfxCount(command.soundId) + 1);
        } else {
          // Replaces the previous occupant
          this.occupants.set(command.channel, {
            soundId: command.soundId,
            volume: command.volume,
            loops: command.loops,
            paused: this.paused,
          });
        }
        break;

      case "stop":
        this.occupants.delete(command.channel);
        break;

      case "setVolume": {
        const current = this.occupants.get(command.channel);
        if (current !== undefined) {
          current.volume = command.volume;
        }
        break;
      }

      case "stopAll":
        this.occupants.clear();
        break;

      case "setMasterVolume":
        this.master = command.volume;
        break;

      case "pauseAll":
      case "resumeAll": {
        this.paused = command.type === "pauseAll";
        for (const current of this.occupants.values()) {
          current.paused = this.paused;
        }
        break;
      }
    }
  }
}
