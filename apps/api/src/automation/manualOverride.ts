import { ManualOverrideRequestSchema } from './schema';
import { InvalidInputError } from './errors';

export interface ManualOverrideAck {
  plantId: string;
  action: string;
  accepted: false;
  implemented: false;
}

/**
 * Manual pump control is not supported yet. Requests are validated and
 * acknowledged as unimplemented; pump state is never touched.
 */
export function handleManualOverride(plantId: string, input: unknown): ManualOverrideAck {
  const parsed = ManualOverrideRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw InvalidInputError.fromZodIssues('Invalid manual override request', parsed.error.issues);
  }

  console.log(`[manual] Plant ${plantId} requested "${parsed.data.action}", manual override is not implemented`);

  return {
    plantId,
    action: parsed.data.action,
    accepted: false,
    implemented: false,
  };
}
