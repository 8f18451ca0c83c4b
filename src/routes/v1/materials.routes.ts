import { Router } from 'express';
import { MaterialController } from '../../controllers/material.controller';
import { MaterialService } from '../../services/material.service';
import { requireActor } from '../../middleware/actor.middleware';
import { validate } from '../../middleware/validation.middleware';
import {
  adjustMaterialTotalSchema,
  createMaterialSchema,
  deleteMaterialSchema,
  getMaterialSchema,
  listMaterialsSchema,
  setMaterialStatusSchema,
  updateMaterialSchema,
} from '../../validators/material.validator';

/**
 * Material routes (v1)
 */
export function createMaterialRoutes(materialService: MaterialService): Router {
  const router = Router();
  const materialController = new MaterialController(materialService);

  /**
   * @swagger
   * /v1/materials:
   *   get:
   *     summary: List materials with stock levels
   *     tags: [Materials]
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [available, unavailable]
   *     responses:
   *       200:
   *         description: Materials ordered by name
   */
  router.get('/', validate(listMaterialsSchema), materialController.listMaterials);

  /**
   * @swagger
   * /v1/materials/{id}:
   *   get:
   *     summary: Get material by ID
   *     tags: [Materials]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Material retrieved successfully
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Material'
   *       404:
   *         description: Material not found
   */
  router.get('/:id', validate(getMaterialSchema), materialController.getMaterial);

  /**
   * @swagger
   * /v1/materials:
   *   post:
   *     summary: Create a material (admin)
   *     tags: [Materials]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name, category, unit, total_quantity]
   *             properties:
   *               name:
   *                 type: string
   *               category:
   *                 type: string
   *               unit:
   *                 type: string
   *               description:
   *                 type: string
   *               total_quantity:
   *                 type: integer
   *                 minimum: 0
   *               status:
   *                 type: string
   *                 enum: [available, unavailable]
   *     responses:
   *       201:
   *         description: Material created with all units in stock
   *       403:
   *         description: Admin role required
   */
  router.post('/', requireActor, validate(createMaterialSchema), materialController.createMaterial);

  /**
   * @swagger
   * /v1/materials/{id}:
   *   patch:
   *     summary: Edit a material's descriptive fields (admin)
   *     tags: [Materials]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Material updated
   *       404:
   *         description: Material not found
   */
  router.patch(
    '/:id',
    requireActor,
    validate(updateMaterialSchema),
    materialController.updateMaterial
  );

  /**
   * @swagger
   * /v1/materials/{id}/status:
   *   put:
   *     summary: Flag a material available or unavailable (admin)
   *     tags: [Materials]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Status changed
   */
  router.put(
    '/:id/status',
    requireActor,
    validate(setMaterialStatusSchema),
    materialController.setMaterialStatus
  );

  /**
   * @swagger
   * /v1/materials/{id}/total:
   *   put:
   *     summary: Set the total quantity owned (admin)
   *     description: Units held by active applications stay reserved; the total cannot drop below them.
   *     tags: [Materials]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [total_quantity]
   *             properties:
   *               total_quantity:
   *                 type: integer
   *                 minimum: 0
   *     responses:
   *       200:
   *         description: Total adjusted
   *       400:
   *         description: Total below reserved units
   */
  router.put(
    '/:id/total',
    requireActor,
    validate(adjustMaterialTotalSchema),
    materialController.adjustMaterialTotal
  );

  /**
   * @swagger
   * /v1/materials/{id}:
   *   delete:
   *     summary: Delete a material (admin)
   *     description: Refused while any application, active or finished, requests the material.
   *     tags: [Materials]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Material deleted
   *       403:
   *         description: Admin role required
   *       404:
   *         description: Material not found
   *       409:
   *         description: Material is referenced by applications
   */
  router.delete(
    '/:id',
    requireActor,
    validate(deleteMaterialSchema),
    materialController.deleteMaterial
  );

  return router;
}
