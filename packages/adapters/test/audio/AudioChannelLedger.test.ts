import { describe, it, expect, beforeEach } from "vitest";
import { AudioChannels, createAudioCommand } from "@kinetica/contracts";
import { AudioChannelLedger } from "../../src/audio/AudioChannelLedger";
import { AudioSystem } from "@kinetica/engine";

describe("AudioChannelLedger", () => {
  let audio: AudioSystem;
  let ledger: AudioChannelLedger;

  beforeEach(() => {
    audio = new AudioSystem();
    ledger = new AudioChannelLedger();
  });

  it("lets sound effects overlap", () => {
    audio.play(5);
    audio.play(5);
    audio.play(6);
    ledger.process(audio.consumeCommands());

    expect(ledger.sfxCount(5)).toBe(2);
    expect(ledger.sfxCount(6)).toBe(1);
    expect(ledger.activeChannels).toEqual([]);
  });

  it("replaces the occupant of an exclusive channel", () => {
    audio.playMusic(1);
    audio.playMusic(2, { volume: 0.4 });
    ledger.process(audio.consumeCommands());

    expect(ledger.occupant(AudioChannels.MUSIC)).toEqual({
      soundId: 2,
      volume: 0.4,
      loops: true,
      paused: false,
    });
  });

  it("follows command order within a frame", () => {
    audio.playMusic(1);
    audio.stopMusic();
    audio.playAmbient(3);
    audio.setVolume(0.25, AudioChannels.AMBIENT);
    ledger.process(audio.consumeCommands());

    expect(ledger.occupant(AudioChannels.MUSIC)).toBeNull();
    expect(ledger.occupant(AudioChannels.AMBIENT)?.volume).toBe(0.25);
    expect(ledger.activeChannels).toEqual([AudioChannels.AMBIENT]);
  });

  it("stops everything", () => {
    audio.playMusic(1);
    audio.playOnChannel(7, AudioChannels.VOICE);
    audio.stopAll();
    ledger.process(audio.consumeCommands());

    expect(ledger.activeChannels).toEqual([]);
  });

  it("tracks pause and master volume", () => {
    ledger.process([
      createAudioCommand("play", { soundId: 1, channel: 1 }),
      createAudioCommand("pauseAll"),
      createAudioCommand("setMasterVolume", { volume: 0.6 }),
    ]);

    expect(ledger.isPaused).toBe(true);
    expect(ledger.occupant(1)?.paused).toBe(true);
    expect(ledger.masterVolume).toBe(0.6);

    ledger.process([createAudioCommand("resumeAll")]);
    expect(ledger.occupant(1)?.paused).toBe(false);
  });

  it("resets", () => {
    audio.playMusic(1);
    audio.play(2);
    ledger.process(audio.consumeCommands());

    ledger.reset();

    expect(ledger.activeChannels).toEqual([]);
    expect(ledger.sfxCount(2)).toBe(0);
    expect(ledger.masterVolume).toBe(1);
  });
});
