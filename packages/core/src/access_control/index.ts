export { evaluate, assertAllowed, ACCESS_RULES } from './access_control';
export { ACCESS_ACTIONS } from './access_control.types';
export type {
  AccessAction,
  AccessContext,
  AccessDecision,
  AccessRule,
  AccessSubject,
} from './access_control.types';
