import type { Application, LineItem } from '../types/application.types';
import { isActiveStatus } from '../types/application.types';
import type { Material, StockStatus } from '../types/material.types';
import { AppError, ErrorCode } from '../types/error.types';
import type { StoreTransaction } from '../repositories/store.types';
import type { Clock } from '../utils/clock';
import { componentLogger } from '../config/logger';

const logger = componentLogger('inventory-ledger');

export type ReserveOutcome =
  | { ok: true; material: Material }
  | { ok: false; reason: 'unavailable' | 'insufficient'; available: number };

const assertPositiveQuantity = (quantity: number): void => {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, 'Quantity must be a positive integer', 400, {
      quantity,
    });
  }
};

/**
 * Take `quantity` units out of stock.
 * Fails without mutation if the material is flagged off or short.
 */
export function reserveUnits(material: Material, quantity: number, at: Date): ReserveOutcome {
  assertPositiveQuantity(quantity);

  if (material.status !== 'available') {
    return { ok: false, reason: 'unavailable', available: material.availableQuantity };
  }
  if (material.availableQuantity < quantity) {
    return { ok: false, reason: 'insufficient', available: material.availableQuantity };
  }

  return {
    ok: true,
    material: {
      ...material,
      availableQuantity: material.availableQuantity - quantity,
      updatedAt: at,
    },
  };
}

/**
 * Return `quantity` units to stock, clamped at the total
 */
export function releaseUnits(material: Material, quantity: number, at: Date): Material {
  assertPositiveQuantity(quantity);

  return {
    ...material,
    availableQuantity: Math.min(material.availableQuantity + quantity, material.totalQuantity),
    updatedAt: at,
  };
}

/**
 * Move the ceiling while keeping units held by active applications reserved
 */
export function adjustTotalUnits(material: Material, totalQuantity: number, at: Date): Material {
  if (!Number.isInteger(totalQuantity) || totalQuantity < 0) {
    throw new AppError(
      ErrorCode.VALIDATION_ERROR,
      'Total quantity must be a non-negative integer',
      400,
      { totalQuantity }
    );
  }

  const reserved = material.totalQuantity - material.availableQuantity;
  if (totalQuantity < reserved) {
    throw new AppError(
      ErrorCode.VALIDATION_ERROR,
      `Total quantity cannot drop below the ${reserved} units currently reserved`,
      400,
      { requestedTotal: totalQuantity, reserved }
    );
  }

  return {
    ...material,
    totalQuantity,
    availableQuantity: totalQuantity - reserved,
    updatedAt: at,
  };
}

export function stockStatus(material: Material, requested: number): StockStatus {
  if (material.availableQuantity >= requested) return 'sufficient';
  if (material.availableQuantity > 0) return 'low';
  return 'insufficient';
}

/**
 * Inventory Ledger
 *
 * Applies reserve/release/adjust to materials inside a store transaction.
 * The transaction makes a multi-line reservation all-or-nothing: if a later
 * line fails, earlier decrements are discarded with it.
 */
export class InventoryLedger {
  constructor(
    private tx: StoreTransaction,
    private clock: Clock
  ) {}

  async reserve(materialId: string, quantity: number): Promise<Material> {
    const material = await this.requireMaterial(materialId);
    const outcome = reserveUnits(material, quantity, this.clock());

    if (!outcome.ok) {
      if (outcome.reason === 'unavailable') {
        throw new AppError(
          ErrorCode.RESOURCE_UNAVAILABLE,
          `Material ${material.name} is currently unavailable`,
          409,
          { materialId }
        );
      }

      throw new AppError(
        ErrorCode.INSUFFICIENT_INVENTORY,
        `Cannot reserve ${quantity} ${material.unit} of ${material.name}. Only ${outcome.available} available.`,
        409,
        { materialId, requested: quantity, available: outcome.available }
      );
    }

    await this.tx.saveMaterial(outcome.material);
    return outcome.material;
  }

  async release(materialId: string, quantity: number): Promise<Material> {
    const material = await this.requireMaterial(materialId);
    const released = releaseUnits(material, quantity, this.clock());

    if (released.availableQuantity - material.availableQuantity < quantity) {
      logger.warn('Release clamped at total quantity', {
        materialId,
        quantity,
        before: material.availableQuantity,
        total: material.totalQuantity,
      });
    }

    await this.tx.saveMaterial(released);
    return released;
  }

  async reserveLineItems(lineItems: readonly LineItem[]): Promise<void> {
    for (const item of lineItems) {
      await this.reserve(item.materialId, item.quantity);
    }
  }

  /**
   * Give back everything an application holds.
   * A no-op once the application is no longer active, so a hold is
   * released at most once.
   */
  async releaseHold(application: Application): Promise<void> {
    if (!isActiveStatus(application.status)) {
      logger.debug('Hold already released', {
        applicationId: application.id,
        status: application.status,
      });
      return;
    }

    for (const item of application.lineItems) {
      await this.release(item.materialId, item.quantity);
    }
  }

  async adjustTotal(materialId: string, totalQuantity: number): Promise<Material> {
    const material = await this.requireMaterial(materialId);
    const adjusted = adjustTotalUnits(material, totalQuantity, this.clock());
    await this.tx.saveMaterial(adjusted);
    return adjusted;
  }

  private async requireMaterial(materialId: string): Promise<Material> {
    const material = await this.tx.getMaterial(materialId);

    if (!material) {
      throw new AppError(
        ErrorCode.MATERIAL_NOT_FOUND,
        `Material with ID ${materialId} not found`,
        404
      );
    }

    return material;
  }
}
