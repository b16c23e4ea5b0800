/**
 * tryable/throwing entry point
 *
 * Callback types declaring the failure they may throw, with their
 * composition operators.
 */
export {
  type Declares,
  type Comparable,
  type TSupplier,
  type TRunnable,
  TFunction,
  TConsumer,
  TPredicate,
  TComparator,
  TBiFunction,
  TBiConsumer,
  TBiPredicate,
  TUnaryOperator,
  TBinaryOperator,
} from "./throwing";
