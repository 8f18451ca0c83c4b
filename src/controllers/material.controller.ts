import { Request, Response } from 'express';
import { MaterialService } from '../services/material.service';
import { createListResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { actorOf } from '../middleware/actor.middleware';
import {
  adjustMaterialTotalSchema,
  createMaterialSchema,
  deleteMaterialSchema,
  getMaterialSchema,
  listMaterialsSchema,
  setMaterialStatusSchema,
  updateMaterialSchema,
} from '../validators/material.validator';

/**
 * Material Controller
 *
 * HTTP request handlers for the material catalog
 */
export class MaterialController {
  constructor(private materialService: MaterialService) {}

  listMaterials = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listMaterialsSchema, req);

    const materials = await this.materialService.listMaterials(query.status);

    res.status(200).json(createListResponse(materials));
  });

  getMaterial = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getMaterialSchema, req);

    const material = await this.materialService.getMaterial(params.id);

    res.status(200).json(createSuccessResponse(material));
  });

  /**
   * POST /v1/materials
   * New materials start fully in stock
   */
  createMaterial = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createMaterialSchema, req);

    const material = await this.materialService.createMaterial(actorOf(req), {
      name: body.name,
      category: body.category,
      unit: body.unit,
      description: body.description,
      totalQuantity: body.total_quantity,
      status: body.status,
    });

    res.status(201).json(createSuccessResponse(material));
  });

  updateMaterial = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(updateMaterialSchema, req);

    const material = await this.materialService.updateMaterialDetails(actorOf(req), params.id, body);

    res.status(200).json(createSuccessResponse(material));
  });

  setMaterialStatus = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(setMaterialStatusSchema, req);

    const material = await this.materialService.setMaterialStatus(actorOf(req), params.id, body.status);

    res.status(200).json(createSuccessResponse(material));
  });

  /**
   * PUT /v1/materials/:id/total
   * Restock or write off units; cannot drop below what is reserved
   */
  adjustMaterialTotal = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(adjustMaterialTotalSchema, req);

    const material = await this.materialService.adjustMaterialTotal(
      actorOf(req),
      params.id,
      body.total_quantity
    );

    res.status(200).json(createSuccessResponse(material));
  });

  deleteMaterial = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(deleteMaterialSchema, req);

    await this.materialService.deleteMaterial(actorOf(req), params.id);

    res.status(200).json(createSuccessResponse({ id: params.id }, 'Material deleted'));
  });
}
