import { describe, it, expect, beforeEach, vi } from 'vitest';

const { get } = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock('axios', () => ({
  default: { get },
}));

import { ForecastError, ONE_CALL_URL, getWeeklyForecast } from '../fetchWeatherData';

// 2023-11-14T00:00:00Z
const NOV_14 = 1699920000;
const DAY = 86400;

const today = {
  dt: NOV_14 - DAY + 43200,
  sunrise: NOV_14 - DAY + 24000,
  sunset: NOV_14 - DAY + 58000,
  temp: { min: 1, max: 9 },
  weather: [{ description: 'fog', icon: '50d' }],
};

const tuesday = {
  dt: NOV_14 + 43200,
  sunrise: NOV_14 + 6 * 3600 + 42 * 60,
  sunset: NOV_14 + 16 * 3600 + 5 * 60,
  temp: { min: 3.04, max: 12.36 },
  humidity: 81,
  dew_point: 1.96,
  wind_speed: 4.26,
  wind_deg: 200,
  weather: [{ description: 'light rain', icon: '10d' }],
  pop: 0.35,
  rain: 2.44,
  uvi: 1.5,
};

const wednesday = {
  dt: NOV_14 + DAY + 43200,
  sunrise: NOV_14 + DAY + 6 * 3600,
  sunset: NOV_14 + DAY + 16 * 3600,
  temp: { min: -2, max: 4 },
  weather: [{ description: 'clear sky', icon: '01d' }],
};

describe('getWeeklyForecast', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('requests the daily One Call forecast in metric units', async () => {
    get.mockResolvedValue({ data: { daily: [today, tuesday] } });

    await getWeeklyForecast('42.36', '-71.06', 'test-key');

    expect(get).toHaveBeenCalledWith(ONE_CALL_URL, {
      params: {
        lat: '42.36',
        lon: '-71.06',
        exclude: 'current,minutely,hourly,alerts',
        appid: 'test-key',
        units: 'metric',
      },
    });
  });

  it('skips today and maps the following days', async () => {
    get.mockResolvedValue({ data: { daily: [today, tuesday, wednesday] } });

    const days = await getWeeklyForecast('42.36', '-71.06', 'test-key');

    expect(days).toEqual([
      {
        date: '2023-11-14',
        dayName: 'Tuesday',
        monthDay: 'November 14',
        weatherDesc: 'Light rain',
        icon: '10d',
        highTemp: 12.4,
        lowTemp: 3,
        windSpeed: 4.3,
        windDirection: 'SSW',
        humidity: 81,
        dewPoint: 2,
        precipitation: 2.4,
        precipChance: 35,
        uvIndex: 1.5,
        sunrise: '06:42 UTC',
        sunset: '16:05 UTC',
      },
      {
        date: '2023-11-15',
        dayName: 'Wednesday',
        monthDay: 'November 15',
        weatherDesc: 'Clear sky',
        icon: '01d',
        highTemp: 4,
        lowTemp: -2,
        windSpeed: 0,
        windDirection: 'N/A',
        humidity: undefined,
        dewPoint: 0,
        precipitation: 0,
        precipChance: 0,
        uvIndex: undefined,
        sunrise: '06:00 UTC',
        sunset: '16:00 UTC',
      },
    ]);
  });

  it('returns at most seven days', async () => {
    const daily = Array.from({ length: 9 }, (_, i) => ({ ...wednesday, dt: NOV_14 + i * DAY }));
    get.mockResolvedValue({ data: { daily } });

    const days = await getWeeklyForecast('42.36', '-71.06', 'test-key');

    expect(days).toHaveLength(7);
    expect(days[0].date).toBe('2023-11-15');
    expect(days[6].date).toBe('2023-11-21');
  });

  it('rejects a response without daily data', async () => {
    get.mockResolvedValue({ data: { current: {} } });

    await expect(getWeeklyForecast('42.36', '-71.06', 'test-key')).rejects.toThrow(
      new ForecastError('Unexpected forecast response at daily: Required'),
    );
  });

  it('rejects a forecast with no upcoming days', async () => {
    get.mockResolvedValue({ data: { daily: [today] } });

    await expect(getWeeklyForecast('42.36', '-71.06', 'test-key')).rejects.toThrow(
      'Forecast response contained no upcoming days',
    );
  });

  it('propagates HTTP failures', async () => {
    get.mockRejectedValue(new Error('Request failed with status code 401'));

    await expect(getWeeklyForecast('42.36', '-71.06', 'test-key')).rejects.toThrow(
      'Request failed with status code 401',
    );
  });
});
