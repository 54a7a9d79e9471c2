import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  CraftErrorCode,
  CraftRequestState,
} from "@/shared/constants/CraftingEnums";
import { NetworkErrorCode } from "@/shared/constants/NetworkEnums";
import { StorageEventType } from "@/shared/constants/StorageEventEnums";
import type {
  CraftabilityResult,
  CraftCheckOutcome,
  CraftRequestOutcome,
} from "@/shared/types/crafting";
import type { NetworkResolution } from "@/shared/types/storage";
import type { Position } from "@/shared/types/world";
import { toKey } from "@/shared/utils/PositionUtils";
import type { IStorageProvider } from "../storage/IStorageProvider";
import { StorageEventBus } from "../storage/StorageEventBus";
import { StorageNetworkResolver } from "../storage/StorageNetworkResolver";
import { RecursiveCrafter } from "./RecursiveCrafter";

type Outcome = Omit<CraftRequestOutcome, "correlationId" | "state" | "transitions">;

/**
 * Entry point for crafting requests.
 *
 * A request moves Idle -> Checking, then either to Infeasible or through
 * Planning and Executing to Completed or PartialCraftFailure. Given an origin
 * tile, the storage network is resolved first and the request runs with the
 * provider narrowed to that network's units.
 */
@injectable()
export class CraftingService {
  private state = CraftRequestState.IDLE;
  private transitions: CraftRequestState[] = [];
  private correlationId = "";

  constructor(
    @inject(TYPES.StorageNetworkResolver) private readonly resolver: StorageNetworkResolver,
    @inject(TYPES.StorageProvider) private readonly provider: IStorageProvider,
    @inject(TYPES.RecursiveCrafter) private readonly crafter: RecursiveCrafter,
    @inject(TYPES.StorageEventBus) private readonly eventBus: StorageEventBus,
  ) {}

  public getState(): CraftRequestState {
    return this.state;
  }

  /**
   * Read-only feasibility check. Nothing in storage or the inventory moves
   * and no event is queued. Feasible means a plan exists and every step's
   * output fits.
   */
  public check(itemId: string, quantity: number, origin?: Position): CraftCheckOutcome {
    if (!origin) {
      const check = this.confirm(itemId, quantity);
      return { feasible: check.feasible, error: check.error, message: check.message, check };
    }

    const resolution = this.resolver.resolveCached(origin);
    if (!resolution.success) {
      return {
        feasible: false,
        error: resolution.error,
        message: resolution.message,
        network: resolution.result,
      };
    }

    const check = this.provider.withTemporaryPositions(
      resolution.result.unitPositions,
      () => this.confirm(itemId, quantity),
      { quiet: true },
    );
    return {
      feasible: check.feasible,
      error: check.error,
      message: check.message,
      network: resolution.result,
      check,
    };
  }

  public request(itemId: string, quantity: number, origin?: Position): CraftRequestOutcome {
    this.correlationId = logger.startCorrelation("craft");
    this.state = CraftRequestState.IDLE;
    this.transitions = [CraftRequestState.IDLE];

    try {
      logger.info(
        `⚒️ [CRAFT] Request ${quantity}x ${itemId}${origin ? ` from ${toKey(origin)}` : ""}`,
        LogCategory.CRAFTING,
      );
      this.transition(CraftRequestState.CHECKING);

      if (!origin) return this.finish(this.run(itemId, quantity));

      const resolution = this.resolver.tryResolveNetwork(origin);
      if (!resolution.success) return this.finish(this.rejectNetwork(resolution));

      const network = resolution.result;
      const outcome = this.provider.withTemporaryPositions(network.unitPositions, () =>
        this.run(itemId, quantity),
      );
      return this.finish({ ...outcome, network });
    } finally {
      logger.endCorrelation();
    }
  }

  private confirm(itemId: string, quantity: number): CraftabilityResult {
    return this.crafter.buildPlan(itemId, quantity, this.provider.getMaterialView()).result;
  }

  private run(itemId: string, quantity: number): Outcome {
    const planned = this.crafter.buildPlan(itemId, quantity, this.provider.getMaterialView());
    if (!planned.ok) {
      this.transition(CraftRequestState.INFEASIBLE);
      return { error: planned.result.error, check: planned.result };
    }

    this.transition(CraftRequestState.PLANNING);
    const { plan } = planned;
    logger.debug(
      `⚒️ [CRAFT] Plan for ${quantity}x ${itemId}: ${plan.steps.length} step(s)`,
      LogCategory.CRAFTING,
      { raw: Object.fromEntries(plan.rawMaterials) },
    );

    this.transition(CraftRequestState.EXECUTING);
    const execution = this.crafter.execute(plan);
    this.transition(execution.state);

    return { error: execution.error, check: planned.result, plan, execution };
  }

  private rejectNetwork(resolution: NetworkResolution): Outcome {
    logger.info(
      `⚒️ [CRAFT] Network unusable: ${resolution.error ?? NetworkErrorCode.NETWORK_NOT_FOUND}`,
      LogCategory.CRAFTING,
    );
    this.transition(CraftRequestState.INFEASIBLE);
    return { error: resolution.error, network: resolution.result };
  }

  private finish(outcome: Outcome): CraftRequestOutcome {
    if (outcome.error && outcome.error !== CraftErrorCode.PARTIAL_CRAFT_FAILURE) {
      logger.debug(`⚒️ [CRAFT] Request ended in ${this.state}`, LogCategory.CRAFTING, {
        error: outcome.error,
      });
    }
    return {
      ...outcome,
      correlationId: this.correlationId,
      state: this.state,
      transitions: [...this.transitions],
    };
  }

  private transition(to: CraftRequestState): void {
    const from = this.state;
    this.state = to;
    this.transitions.push(to);
    this.eventBus.queueEvent(StorageEventType.CRAFT_STATE_CHANGED, {
      correlationId: this.correlationId,
      from,
      to,
    });
  }
}
