export { WarpGeometryGrid } from "./WarpGeometryGrid";
export {
  wave,
  bulge,
  twist,
  type WaveOptions,
  type BulgeOptions,
  type TwistOptions,
  type RadialOptions,
} from "./presets";
export {
  WarpToAnimation,
  WarpSequenceAnimation,
  warpTo,
  animateWithWarps,
  type WarpAnimation,
  type Warpable,
} from "./WarpAnimation";
