export { Guardian, parseGuardianDecision } from './guardian';
export type { GuardianOptions } from './guardian';
export { IntentClassifier, parseRouteDecision } from './intentClassifier';
export type { IntentClassifierOptions, RouteVerdict } from './intentClassifier';
