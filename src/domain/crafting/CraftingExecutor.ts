import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { CraftErrorCode } from "@/shared/constants/CraftingEnums";
import type {
  CraftStep,
  IngredientSource,
  StepOutcome,
} from "@/shared/types/crafting";
import type { IStorageProvider } from "../storage/IStorageProvider";

interface Requirement {
  itemId: string;
  amount: number;
}

function fail(
  error: CraftErrorCode,
  message: string,
  consumed: readonly IngredientSource[] = [],
): StepOutcome {
  return { success: false, error, message, consumed, producedToStorage: 0, producedToInventory: 0 };
}

/**
 * Runs one craft step against the provider.
 *
 * Counts and output capacity are checked right before anything moves; the
 * capacity counts slots the step's own ingredients will free. A step that
 * cannot run is rejected untouched. Ingredients are withdrawn from
 * storage first, then from the inventory. Output goes to storage first and
 * overflows into the inventory. When the host hands back less than was
 * validated, everything taken for the step goes back where it came from.
 */
@injectable()
export class CraftingExecutor {
  constructor(
    @inject(TYPES.StorageProvider) private readonly provider: IStorageProvider,
  ) {}

  public executeStep(step: CraftStep): StepOutcome {
    const { recipe, repeatCount } = step;
    const outputId = recipe.output.itemId;
    const outputAmount = recipe.output.count * repeatCount;
    const requirements = this.collectRequirements(step);

    if (requirements.length === 0 || !Number.isInteger(repeatCount) || repeatCount <= 0) {
      return fail(CraftErrorCode.INVALID_REQUEST, `Step ${step.index} has nothing to craft`);
    }

    for (const requirement of requirements) {
      const available = this.provider.getItemCount(requirement.itemId);
      if (available < requirement.amount) {
        return fail(
          CraftErrorCode.INSUFFICIENT_MATERIALS,
          `Need ${requirement.amount}x ${requirement.itemId}, found ${available}`,
        );
      }
    }

    const room = this.provider.simulateCrafts([
      { withdrawals: requirements, output: { itemId: outputId, amount: outputAmount } },
    ]);
    if (!room.fits) {
      return fail(
        CraftErrorCode.NO_CAPACITY,
        `No room for ${outputAmount}x ${outputId} (capacity ${room.capacity})`,
      );
    }

    const taken: IngredientSource[] = [];
    for (const requirement of requirements) {
      const fromStorage = this.provider.tryWithdraw(requirement.itemId, requirement.amount);
      const fromInventory =
        fromStorage < requirement.amount
          ? this.provider.tryWithdrawFromInventory(
              requirement.itemId,
              requirement.amount - fromStorage,
            )
          : 0;
      taken.push({ itemId: requirement.itemId, fromStorage, fromInventory });

      if (fromStorage + fromInventory < requirement.amount) {
        this.returnIngredients(taken);
        return fail(
          CraftErrorCode.WRITE_CONFLICT,
          `Withdrew ${fromStorage + fromInventory}/${requirement.amount} ${requirement.itemId}`,
        );
      }
    }

    const storageRemainder = this.provider.tryDeposit(outputId, outputAmount);
    const inventoryRemainder =
      storageRemainder > 0
        ? this.provider.tryDepositToInventory(outputId, storageRemainder)
        : 0;

    if (inventoryRemainder > 0) {
      this.provider.tryWithdraw(outputId, outputAmount - storageRemainder);
      this.provider.tryWithdrawFromInventory(outputId, storageRemainder - inventoryRemainder);
      this.returnIngredients(taken);
      return fail(
        CraftErrorCode.WRITE_CONFLICT,
        `Output deposit refused ${inventoryRemainder}x ${outputId}`,
      );
    }

    logger.debug(
      `⚒️ [CRAFT] Step ${step.index}: ${repeatCount}x recipe #${recipe.id} -> ${outputAmount}x ${outputId}`,
      LogCategory.CRAFTING,
    );

    return {
      success: true,
      consumed: taken,
      producedToStorage: outputAmount - storageRemainder,
      producedToInventory: storageRemainder,
    };
  }

  /**
   * Concrete items the step consumes. Planned sources name the items chosen
   * for group ingredients.
   */
  private collectRequirements(step: CraftStep): Requirement[] {
    const totals = new Map<string, number>();
    for (const source of step.ingredientSources) {
      const amount = source.fromStorage + source.fromInventory;
      if (amount > 0) totals.set(source.itemId, (totals.get(source.itemId) ?? 0) + amount);
    }
    return [...totals].map(([itemId, amount]) => ({ itemId, amount }));
  }

  private returnIngredients(taken: readonly IngredientSource[]): void {
    for (const source of taken) {
      let lost = 0;
      if (source.fromStorage > 0) {
        const overflow = this.provider.tryDeposit(source.itemId, source.fromStorage);
        lost += overflow > 0 ? this.provider.tryDepositToInventory(source.itemId, overflow) : 0;
      }
      if (source.fromInventory > 0) {
        const overflow = this.provider.tryDepositToInventory(source.itemId, source.fromInventory);
        lost += overflow > 0 ? this.provider.tryDeposit(source.itemId, overflow) : 0;
      }
      if (lost > 0) {
        logger.error(
          `⚒️ [CRAFT] Could not return ${lost}x ${source.itemId} after a failed step`,
          LogCategory.CRAFTING,
        );
      }
    }
  }
}
