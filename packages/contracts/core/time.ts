export type Seconds = number;    // durations (timesteps, fades)
export type SimSeconds = number; // simulation time since the loop started
