import { ConcurrentEvaluator } from './concurrent-evaluator';
import { Evaluator } from './evaluator';
import { SequentialEvaluator } from './sequential-evaluator';
import { WorkerPoolEvaluator } from './worker-pool-evaluator';
import {
  ConcurrentEvaluatorOptions,
  EvaluationMode,
  WorkerPoolEvaluatorOptions,
} from '../types/evaluator-options';

export type CreateEvaluatorOptions = ConcurrentEvaluatorOptions & WorkerPoolEvaluatorOptions;

/**
 * Creates the evaluator of a built-in mode
 */
export function createEvaluator(
  mode: EvaluationMode,
  options: CreateEvaluatorOptions = {}
): Evaluator {
  switch (mode) {
    case EvaluationMode.SEQUENTIAL:
      return new SequentialEvaluator(options);
    case EvaluationMode.CONCURRENT:
      return new ConcurrentEvaluator(options);
    case EvaluationMode.WORKER_POOL:
      return new WorkerPoolEvaluator(options);
  }
}
