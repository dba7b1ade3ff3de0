export {
  Classifier,
  createClassifier,
  declaredKindRule,
  overrideRule,
  pathSegmentRule,
  nameSuffixRule,
  tokenizeIdentity,
  DEFAULT_CLASSIFIER_OPTIONS,
} from './classifier.js';
export type { ClassificationRule, ClassifierOptions, KindOverride } from './classifier.js';
