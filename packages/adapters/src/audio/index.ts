export { AudioChannelLedger, type ChannelOccupant } from "./AudioChannelLedger";
