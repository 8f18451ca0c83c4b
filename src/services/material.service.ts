import { randomUUID } from 'crypto';
import type { ReservationStore } from '../repositories/store.types';
import type { Actor } from '../types/actor.types';
import type {
  CreateMaterialInput,
  Material,
  MaterialStatus,
  UpdateMaterialRequest,
} from '../types/material.types';
import { AppError, duplicateMaterialName, ErrorCode } from '../types/error.types';
import { InventoryLedger } from './inventory-ledger';
import { assertUnreferenced } from './catalog-references';
import { assertAdmin } from '../utils/authorization';
import { systemClock, Clock } from '../utils/clock';
import { componentLogger } from '../config/logger';

const logger = componentLogger('materials');

/**
 * Material Service
 *
 * Material catalog maintenance. Quantities are never edited directly:
 * `adjustMaterialTotal` goes through the Inventory Ledger so units held by
 * active applications stay reserved.
 */
export class MaterialService {
  constructor(
    private store: ReservationStore,
    private clock: Clock = systemClock
  ) {}

  async createMaterial(actor: Actor, input: CreateMaterialInput): Promise<Material> {
    assertAdmin(actor, 'create materials');

    if (!Number.isInteger(input.totalQuantity) || input.totalQuantity < 0) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        'Total quantity must be a non-negative integer',
        400,
        { totalQuantity: input.totalQuantity }
      );
    }

    const name = input.name.trim();
    await this.assertNameFree(name);

    logger.info('Creating material', { name, actorId: actor.id });

    const now = this.clock();
    const material = await this.store.insertMaterial({
      id: randomUUID(),
      name,
      category: input.category.trim(),
      unit: input.unit.trim(),
      description: input.description,
      totalQuantity: input.totalQuantity,
      availableQuantity: input.totalQuantity,
      status: input.status ?? 'available',
      version: 1,
      createdAt: now,
      updatedAt: now,
    });

    logger.info('Material created successfully', { materialId: material.id });
    return material;
  }

  async getMaterial(id: string): Promise<Material> {
    logger.debug('Getting material', { id });

    const material = await this.store.findMaterialById(id);

    if (!material) {
      throw new AppError(ErrorCode.MATERIAL_NOT_FOUND, `Material with ID ${id} not found`, 404);
    }

    return material;
  }

  listMaterials(status?: MaterialStatus): Promise<Material[]> {
    return this.store.listMaterials(status);
  }

  async updateMaterialDetails(
    actor: Actor,
    id: string,
    request: UpdateMaterialRequest
  ): Promise<Material> {
    assertAdmin(actor, 'edit materials');
    if (request.name !== undefined) await this.assertNameFree(request.name.trim(), id);

    await this.store.runInTransaction({ materialIds: [id] }, async (tx) => {
      const material = await tx.getMaterial(id);
      if (!material) {
        throw new AppError(ErrorCode.MATERIAL_NOT_FOUND, `Material with ID ${id} not found`, 404);
      }

      await tx.saveMaterial({
        ...material,
        ...(request.name !== undefined && { name: request.name.trim() }),
        ...(request.category !== undefined && { category: request.category.trim() }),
        ...(request.unit !== undefined && { unit: request.unit.trim() }),
        ...(request.description !== undefined && { description: request.description }),
        updatedAt: this.clock(),
      });
    });

    logger.info('Material updated', { materialId: id, fields: Object.keys(request) });
    return this.getMaterial(id);
  }

  async setMaterialStatus(actor: Actor, id: string, status: MaterialStatus): Promise<Material> {
    assertAdmin(actor, 'change material status');

    await this.store.runInTransaction({ materialIds: [id] }, async (tx) => {
      const material = await tx.getMaterial(id);
      if (!material) {
        throw new AppError(ErrorCode.MATERIAL_NOT_FOUND, `Material with ID ${id} not found`, 404);
      }
      if (material.status === status) return;

      await tx.saveMaterial({ ...material, status, updatedAt: this.clock() });
    });

    logger.info('Material status changed', { materialId: id, status });
    return this.getMaterial(id);
  }

  async adjustMaterialTotal(actor: Actor, id: string, totalQuantity: number): Promise<Material> {
    assertAdmin(actor, 'adjust material stock');

    const adjusted = await this.store.runInTransaction({ materialIds: [id] }, (tx) =>
      new InventoryLedger(tx, this.clock).adjustTotal(id, totalQuantity)
    );

    logger.info('Material total adjusted', {
      materialId: id,
      totalQuantity: adjusted.totalQuantity,
      availableQuantity: adjusted.availableQuantity,
    });

    return this.getMaterial(id);
  }

  /**
   * Remove a material no application has ever requested
   */
  async deleteMaterial(actor: Actor, id: string): Promise<void> {
    assertAdmin(actor, 'delete materials');

    await this.store.runInTransaction({ materialIds: [id] }, async (tx) => {
      const material = await tx.getMaterial(id);
      if (!material) {
        throw new AppError(ErrorCode.MATERIAL_NOT_FOUND, `Material with ID ${id} not found`, 404);
      }

      assertUnreferenced('material', id, await tx.listApplicationsUsingMaterial(id));
      await tx.deleteMaterial(material);
    });

    logger.info('Material deleted', { materialId: id, actorId: actor.id });
  }

  // The stores reject a duplicate that races past this check
  private async assertNameFree(name: string, exceptId?: string): Promise<void> {
    const existing = await this.store.findMaterialByName(name);
    if (existing && existing.id !== exceptId) {
      throw duplicateMaterialName(name);
    }
  }
}
