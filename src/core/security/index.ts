export { SecurityGuard } from './SecurityGuard';
export { systemClock } from './types';
export type { AdmissionGuard, Clock, DataEvent, RateState, SecurityPolicy } from './types';
