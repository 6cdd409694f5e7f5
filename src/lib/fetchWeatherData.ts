import axios from 'axios';
import { z } from 'zod';
import type { DayForecast } from '../models';
import {
  capitalize,
  getWindDirection,
  roundTo1,
  unixTimeToTimeOfDay,
  unixToDate,
  unixToDayName,
  unixToMonthDay,
} from './weatherUtils';

export const ONE_CALL_URL = 'https://api.openweathermap.org/data/3.0/onecall';
export const FORECAST_DAYS = 7;

export class ForecastError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ForecastError';
  }
}

const dailySchema = z.object({
  dt: z.number(),
  sunrise: z.number(),
  sunset: z.number(),
  temp: z.object({ min: z.number(), max: z.number() }),
  humidity: z.number().optional(),
  dew_point: z.number().optional(),
  wind_speed: z.number().optional(),
  wind_deg: z.number().optional(),
  weather: z.array(z.object({ description: z.string(), icon: z.string() })).min(1),
  pop: z.number().optional(),
  rain: z.number().optional(),
  uvi: z.number().optional(),
});

const oneCallSchema = z.object({ daily: z.array(dailySchema) });

export type OneCallDaily = z.infer<typeof dailySchema>;

export function toDayForecast(daily: OneCallDaily): DayForecast {
  const [weather] = daily.weather;
  return {
    date: unixToDate(daily.dt),
    dayName: unixToDayName(daily.dt),
    monthDay: unixToMonthDay(daily.dt),
    weatherDesc: capitalize(weather.description),
    icon: weather.icon,
    highTemp: roundTo1(daily.temp.max),
    lowTemp: roundTo1(daily.temp.min),
    windSpeed: roundTo1(daily.wind_speed ?? 0),
    windDirection: getWindDirection(daily.wind_deg),
    humidity: daily.humidity,
    dewPoint: roundTo1(daily.dew_point ?? 0),
    precipitation: roundTo1(daily.rain ?? 0),
    precipChance: roundTo1((daily.pop ?? 0) * 100),
    uvIndex: daily.uvi,
    sunrise: unixTimeToTimeOfDay(daily.sunrise),
    sunset: unixTimeToTimeOfDay(daily.sunset),
  };
}

/**
 * Fetches the forecast for the seven days after today.
 * `daily[0]` is today, so it is skipped.
 */
export async function getWeeklyForecast(
  lat: string,
  lon: string,
  apiKey: string,
): Promise<DayForecast[]> {
  const res = await axios.get(ONE_CALL_URL, {
    params: {
      lat,
      lon,
      exclude: 'current,minutely,hourly,alerts',
      appid: apiKey,
      units: 'metric',
    },
  });

  const parsed = oneCallSchema.safeParse(res.data);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ForecastError(
      `Unexpected forecast response at ${issue.path.join('.') || 'root'}: ${issue.message}`,
    );
  }

  const weeklyForecast = parsed.data.daily.slice(1, FORECAST_DAYS + 1).map(toDayForecast);
  if (weeklyForecast.length === 0) {
    throw new ForecastError('Forecast response contained no upcoming days');
  }
  return weeklyForecast;
}
