/**
 * wttr.in响应 → 城市天气候选记录
 * 以摄氏度为准换算华氏度，风速由km/h换算为m/s
 */

import { RawRecord, SourceId } from '../../collection/types/raw-record';
import { CandidateRecord } from '../types/processed-record';
import { UnknownRecord, isRecord, isRecordArray, optionalString } from '../../utils/type-guards';
import { celsiusToFahrenheit, fahrenheitToCelsius, kmphToMps, malformedPayload, toNumber } from './helpers';

function describeCondition(current: UnknownRecord): string {
  const descriptions = current.weatherDesc;
  if (isRecordArray(descriptions) && descriptions.length > 0) {
    return optionalString(descriptions[0], 'value') || 'Unknown';
  }
  return 'Unknown';
}

function transformObservation(city: unknown, response: unknown): CandidateRecord {
  if (!isRecord(response) || !isRecordArray(response.current_condition) || response.current_condition.length === 0) {
    return { city };
  }
  const current = response.current_condition[0];

  const celsius = toNumber(current.temp_C);
  const fahrenheit = toNumber(current.temp_F);
  const windKmph = toNumber(current.windspeedKmph);

  let temperatureC: number | undefined = celsius;
  let temperatureF: number | undefined;
  if (celsius !== undefined) {
    temperatureF = celsiusToFahrenheit(celsius);
  } else if (fahrenheit !== undefined) {
    temperatureC = fahrenheitToCelsius(fahrenheit);
    temperatureF = fahrenheit;
  }

  return {
    city,
    temperatureC,
    temperatureF,
    condition: describeCondition(current),
    humidity: current.humidity,
    windSpeedKmph: windKmph,
    windSpeedMps: windKmph === undefined ? undefined : kmphToMps(windKmph)
  };
}

export function transformWeather(raw: RawRecord): CandidateRecord[] {
  const payload = raw.payload;
  if (!isRecord(payload) || !isRecordArray(payload.observations)) {
    throw malformedPayload(SourceId.WEATHER, 'Weather payload has no observations array');
  }

  return payload.observations.map(observation => transformObservation(observation.city, observation.response));
}
