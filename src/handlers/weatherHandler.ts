import console from 'console';
import process from 'process';
import { getNotifierConfig } from '../config/env';
import { ConfigError } from '../config/validate';
import { getWeeklyForecast } from '../lib/fetchWeatherData';
import { buildForecastPayloads, sendNotification } from '../lib/notify';

export async function handler(
  env: NodeJS.ProcessEnv = process.env,
): Promise<{ status: number; body?: string }> {
  try {
    const config = getNotifierConfig(env);
    console.info(
      `Fetching weekly weather data for ${config.CITY_NAME} (${config.LATITUDE}, ${config.LONGITUDE})...`,
    );
    const days = await getWeeklyForecast(
      config.LATITUDE,
      config.LONGITUDE,
      config.OPENWEATHER_API_KEY,
    );
    console.info(`Fetched forecast for ${days.length} days.`);

    const payloads = buildForecastPayloads(config.CITY_NAME, days, config.TAG_ID);
    await sendNotification(config.DISCORD_WEBHOOK, payloads);
    return { status: 200 };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    if (err instanceof ConfigError) {
      console.error(message);
      return { status: 400, body: message };
    }
    console.error('Failure in weather handler:', err);
    return { status: 500, body: message };
  }
}
