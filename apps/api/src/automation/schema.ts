import { z } from 'zod';

const reading = z.number().finite();

/**
 * One telemetry sample as reported by the plant node.
 * Extra fields are stripped; every listed field is required.
 */
export const SensorSampleSchema = z.object({
  soil_moisture: reading,
  temperature: reading,
  light_intensity: reading,
  nitrogen: reading,
  phosphorus: reading,
  potassium: reading,
});

export type SensorSample = Readonly<z.infer<typeof SensorSampleSchema>>;

/**
 * Normalized answer from a weather source. Anything that does not match,
 * including a non-ok status, counts as a failed lookup.
 */
export const WeatherResponseSchema = z.object({
  status_ok: z.literal(true),
  condition: z.string().min(1),
  temp: reading,
  humidity: reading,
});

export type WeatherResponse = z.infer<typeof WeatherResponseSchema>;

export const WeatherFailureResponseSchema = z.object({
  status_ok: z.literal(false),
  reason: z.string().optional(),
});

export type WeatherFailureResponse = z.infer<typeof WeatherFailureResponseSchema>;

export const ManualOverrideRequestSchema = z.object({
  action: z.string().min(1),
});

export type ManualOverrideRequest = z.infer<typeof ManualOverrideRequestSchema>;
