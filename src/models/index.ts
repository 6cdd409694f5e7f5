export interface DayForecast {
  date: string;
  dayName: string;
  monthDay: string;
  weatherDesc: string;
  icon: string;
  highTemp: number;
  lowTemp: number;
  windSpeed: number;
  windDirection: string;
  humidity?: number;
  dewPoint: number;
  precipitation: number;
  precipChance: number;
  uvIndex?: number;
  sunrise: string;
  sunset: string;
}

export interface ScheduledJob {
  expression: string;
  command: string;
  line: number;
}

/** Variables captured from the container environment, in capture order. */
export type EnvironmentSnapshot = Record<string, string>;

export interface CommandResult {
  exitCode: number;
  output: string;
}

export interface CommandOptions {
  env?: EnvironmentSnapshot;
  // Collect stdout/stderr into `output` instead of inheriting the parent's streams
  capture?: boolean;
  signal?: AbortSignal;
}

export type CommandRunner = (command: string, options?: CommandOptions) => Promise<CommandResult>;

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;
