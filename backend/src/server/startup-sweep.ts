import { PrecipitationSweep, SweepParams, SweepResult } from '../utils/precipitation-sweep.js';

// One sweep when the service comes up. Records are only logged; a failure was already reported by the sweep.
export const createStartupSweep = (sweep: PrecipitationSweep, params: SweepParams) => async (): Promise<SweepResult> => {
  const result = await sweep.run(params);
  if (result.ok) {
    console.log('[Weather] Startup sweep records:', JSON.stringify(result.records));
  }
  return result;
};
