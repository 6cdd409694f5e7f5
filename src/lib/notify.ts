import axios from 'axios';
import console from 'console';
import messages from '../messages.json';
import type { DayForecast } from '../models';

// Discord accepts at most this many embeds per message
export const DISCORD_EMBED_LIMIT = 10;
export const ICON_BASE_URL = 'https://openweathermap.org/img/wn';

export interface DiscordEmbed {
  title: string;
  description: string;
  thumbnail: { url: string };
  footer?: { text: string };
}

export interface DiscordPayload {
  content?: string;
  embeds: DiscordEmbed[];
}

const templates = messages.forecast.en;

// Replaces every occurrence of each token with its value
export function replaceTokens(msg: string, values: Record<string, string>): string {
  let out = msg;
  for (const [token, value] of Object.entries(values)) {
    out = out.split(token).join(value);
  }
  return out;
}

function orNotAvailable(value: number | undefined): string {
  return value === undefined ? 'N/A' : String(value);
}

export function iconUrl(icon: string): string {
  return `${ICON_BASE_URL}/${icon}@2x.png`;
}

/** One embed per day, with the OpenWeatherMap icon as its thumbnail. */
export function formatDay(day: DayForecast): DiscordEmbed {
  const tokens = {
    DAY_NAME: day.dayName,
    MONTH_DAY: day.monthDay,
    WEATHER_DESC: day.weatherDesc,
    HIGH_TEMP: String(day.highTemp),
    LOW_TEMP: String(day.lowTemp),
    WIND_SPEED: String(day.windSpeed),
    WIND_DIRECTION: day.windDirection,
    HUMIDITY: orNotAvailable(day.humidity),
    DEW_POINT: String(day.dewPoint),
    PRECIPITATION: String(day.precipitation),
    PRECIP_CHANCE: String(day.precipChance),
    UV_INDEX: orNotAvailable(day.uvIndex),
    SUNRISE: day.sunrise,
    SUNSET: day.sunset,
  };

  return {
    title: replaceTokens(templates.dayTitle, tokens),
    description: replaceTokens(templates.day, tokens),
    thumbnail: { url: iconUrl(day.icon) },
  };
}

/**
 * Builds the webhook messages for a forecast. The first carries the tag and
 * title as content; the attribution goes in the footer of the last day.
 */
export function buildForecastPayloads(
  city: string,
  days: DayForecast[],
  tagId?: string,
): DiscordPayload[] {
  const embeds = days.map(formatDay);
  if (embeds.length > 0) {
    embeds[embeds.length - 1].footer = { text: templates.footer };
  }

  const payloads: DiscordPayload[] = [];
  for (let i = 0; i < embeds.length; i += DISCORD_EMBED_LIMIT) {
    payloads.push({ embeds: embeds.slice(i, i + DISCORD_EMBED_LIMIT) });
  }
  if (payloads.length === 0) {
    payloads.push({ embeds: [] });
  }

  const title = replaceTokens(templates.title, { CITY_NAME: city });
  payloads[0].content = tagId ? tagId + '\n' + title : title;
  return payloads;
}

export async function sendNotification(webhook: string, payloads: DiscordPayload[]): Promise<void> {
  for (const payload of payloads) {
    await axios.post(webhook, payload);
  }
  const days = payloads.reduce((count, payload) => count + payload.embeds.length, 0);
  console.log(`Notification to Discord: ${days} day(s) in ${payloads.length} message(s)`);
}
