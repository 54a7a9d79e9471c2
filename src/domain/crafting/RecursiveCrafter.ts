import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  CraftErrorCode,
  CraftRequestState,
} from "@/shared/constants/CraftingEnums";
import { StorageEventType } from "@/shared/constants/StorageEventEnums";
import type {
  CraftabilityResult,
  CraftExecutionResult,
  CraftPlan,
  CraftStep,
  FailedStepInfo,
} from "@/shared/types/crafting";
import type { MaterialView, SimulatedCraft } from "@/shared/types/storage";
import type { IStorageProvider } from "../storage/IStorageProvider";
import { StorageEventBus } from "../storage/StorageEventBus";
import { CraftabilityChecker, type CraftAnalysis } from "./CraftabilityChecker";
import { CraftingExecutor } from "./CraftingExecutor";
import { MaterialPool } from "./MaterialPool";

export type PlanResult =
  | { ok: true; plan: CraftPlan; result: CraftabilityResult }
  | { ok: false; result: CraftabilityResult };

function addTo(map: Map<string, number>, itemId: string, amount: number): void {
  if (amount <= 0) return;
  map.set(itemId, (map.get(itemId) ?? 0) + amount);
}

function toSimulatedCraft(step: CraftStep): SimulatedCraft {
  const totals = new Map<string, number>();
  for (const source of step.ingredientSources) {
    addTo(totals, source.itemId, source.fromStorage + source.fromInventory);
  }
  return {
    withdrawals: [...totals].map(([itemId, amount]) => ({ itemId, amount })),
    output: {
      itemId: step.recipe.output.itemId,
      amount: step.recipe.output.count * step.repeatCount,
    },
  };
}

/**
 * Turns a feasible analysis into an ordered plan and runs it step by step.
 */
@injectable()
export class RecursiveCrafter {
  constructor(
    @inject(TYPES.CraftabilityChecker) private readonly checker: CraftabilityChecker,
    @inject(TYPES.CraftingExecutor) private readonly executor: CraftingExecutor,
    @inject(TYPES.StorageProvider) private readonly provider: IStorageProvider,
    @inject(TYPES.StorageEventBus) private readonly eventBus: StorageEventBus,
  ) {}

  public buildPlan(itemId: string, quantity: number, view: MaterialView): PlanResult {
    return this.createPlan(this.checker.analyze(itemId, quantity, view), view);
  }

  /**
   * Replays the analysis steps, leaves first, on a pool built from `view`.
   * Every step must find its planned sources before its output is added,
   * and every output must fit in the provider's slots once its step's
   * ingredients are gone.
   */
  public createPlan(analysis: CraftAnalysis, view: MaterialView): PlanResult {
    const { result, steps } = analysis;
    if (!result.feasible) return { ok: false, result };

    const pool = MaterialPool.fromView(view);
    for (const step of steps) {
      for (const source of step.ingredientSources) {
        if (pool.takeExact(source)) continue;

        const available = pool.count(source.itemId);
        const required = source.fromStorage + source.fromInventory;
        logger.warn(
          `🧾 [PLAN] Step ${step.index} cannot draw ${required}x ${source.itemId}`,
          LogCategory.CRAFTING,
        );
        return {
          ok: false,
          result: {
            ...result,
            feasible: false,
            error: CraftErrorCode.INSUFFICIENT_MATERIALS,
            message: `Plan step ${step.index} is short of ${source.itemId}`,
            shortages: [
              {
                itemId: source.itemId,
                required,
                available,
                missing: Math.max(0, required - available),
              },
            ],
            rawMaterials: new Map<string, number>(),
            stepCount: 0,
          },
        };
      }
      pool.add(step.recipe.output.itemId, step.outputQuantity);
    }

    const room = this.provider.simulateCrafts(steps.map(toSimulatedCraft));
    if (!room.fits) {
      const step = steps[room.index];
      const amount = step.recipe.output.count * step.repeatCount;
      logger.info(
        `🧾 [PLAN] Step ${step.index} has no room for ${amount}x ${step.recipe.output.itemId}`,
        LogCategory.CRAFTING,
      );
      return {
        ok: false,
        result: {
          ...result,
          feasible: false,
          error: CraftErrorCode.NO_CAPACITY,
          message: `No room for ${amount}x ${step.recipe.output.itemId} (capacity ${room.capacity})`,
          rawMaterials: new Map<string, number>(),
          stepCount: 0,
        },
      };
    }

    return {
      ok: true,
      result,
      plan: Object.freeze({
        itemId: result.itemId,
        quantity: result.quantity,
        steps,
        rawMaterials: result.rawMaterials,
      }),
    };
  }

  /**
   * Executes the plan in order and stops at the first failing step. Completed
   * steps stay done.
   */
  public execute(plan: CraftPlan): CraftExecutionResult {
    const consumed = new Map<string, number>();
    const produced = new Map<string, number>();
    let producedQuantity = 0;
    let completedSteps = 0;
    let failedStep: FailedStepInfo | undefined;

    for (const step of plan.steps) {
      const outcome = this.executor.executeStep(step);
      if (!outcome.success) {
        failedStep = {
          index: step.index,
          recipeId: step.recipe.id,
          itemId: step.recipe.output.itemId,
          cause:
            outcome.error === CraftErrorCode.NO_CAPACITY
              ? CraftErrorCode.NO_CAPACITY
              : CraftErrorCode.WRITE_CONFLICT,
          message: outcome.message,
        };
        break;
      }

      const output = outcome.producedToStorage + outcome.producedToInventory;
      for (const source of outcome.consumed) {
        addTo(consumed, source.itemId, source.fromStorage + source.fromInventory);
      }
      addTo(produced, step.recipe.output.itemId, output);
      if (step.recipe.output.itemId === plan.itemId) producedQuantity += output;
      completedSteps++;

      this.eventBus.queueEvent(StorageEventType.CRAFT_STEP_COMPLETED, {
        index: step.index,
        itemId: step.recipe.output.itemId,
        produced: output,
      });
    }

    const success = failedStep === undefined;
    this.eventBus.queueEvent(StorageEventType.CRAFT_FINISHED, {
      itemId: plan.itemId,
      requested: plan.quantity,
      produced: producedQuantity,
      success,
    });

    if (failedStep) {
      logger.warn(
        `⚒️ [CRAFT] ${plan.itemId} stopped at step ${failedStep.index}/${plan.steps.length}: ${failedStep.cause}`,
        LogCategory.CRAFTING,
        { produced: producedQuantity, requested: plan.quantity },
      );
      return {
        success: false,
        state: CraftRequestState.PARTIAL_CRAFT_FAILURE,
        error: CraftErrorCode.PARTIAL_CRAFT_FAILURE,
        itemId: plan.itemId,
        requestedQuantity: plan.quantity,
        producedQuantity,
        completedSteps,
        totalSteps: plan.steps.length,
        failedStep,
        consumed,
        produced,
      };
    }

    logger.info(
      `⚒️ [CRAFT] Crafted ${producedQuantity}x ${plan.itemId} in ${completedSteps} step(s)`,
      LogCategory.CRAFTING,
    );
    return {
      success: true,
      state: CraftRequestState.COMPLETED,
      itemId: plan.itemId,
      requestedQuantity: plan.quantity,
      producedQuantity,
      completedSteps,
      totalSteps: plan.steps.length,
      consumed,
      produced,
    };
  }
}
