export {
  aggregate,
  describeOutcome,
  SENTIMENT_PRECEDENCE,
  type CompositeSignal,
  type Contribution,
  type Abstention,
} from './aggregator.js';
