export {
  AudioSystem,
  type PlayOptions,
  type ChannelPlayOptions,
  type FadeOptions,
} from "./AudioSystem";
