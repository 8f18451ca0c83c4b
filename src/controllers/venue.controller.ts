import { Request, Response } from 'express';
import { VenueService } from '../services/venue.service';
import { ReservationCoordinator } from '../services/reservation-coordinator.service';
import { createListResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { actorOf } from '../middleware/actor.middleware';
import {
  availableVenuesSchema,
  createVenueSchema,
  deleteVenueSchema,
  getVenueSchema,
  listVenuesSchema,
  setVenueStatusSchema,
  updateVenueSchema,
} from '../validators/venue.validator';

/**
 * Venue Controller
 */
export class VenueController {
  constructor(
    private venueService: VenueService,
    private coordinator: ReservationCoordinator
  ) {}

  listVenues = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listVenuesSchema, req);

    const venues = await this.venueService.listVenues(query.status);

    res.status(200).json(createListResponse(venues));
  });

  /**
   * GET /v1/venues/available?start_time=&end_time=
   * Bookable venues with no active booking in the window
   */
  listAvailableVenues = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(availableVenuesSchema, req);

    const venues = await this.coordinator.queryAvailableVenues(
      new Date(query.start_time),
      new Date(query.end_time)
    );

    res.status(200).json(createListResponse(venues));
  });

  getVenue = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getVenueSchema, req);

    const venue = await this.venueService.getVenue(params.id);

    res.status(200).json(createSuccessResponse(venue));
  });

  createVenue = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createVenueSchema, req);

    const venue = await this.venueService.createVenue(actorOf(req), body);

    res.status(201).json(createSuccessResponse(venue));
  });

  updateVenue = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(updateVenueSchema, req);

    const venue = await this.venueService.updateVenueDetails(actorOf(req), params.id, body);

    res.status(200).json(createSuccessResponse(venue));
  });

  setVenueStatus = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(setVenueStatusSchema, req);

    const venue = await this.venueService.setVenueStatus(actorOf(req), params.id, body.status);

    res.status(200).json(createSuccessResponse(venue));
  });

  deleteVenue = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(deleteVenueSchema, req);

    await this.venueService.deleteVenue(actorOf(req), params.id);

    res.status(200).json(createSuccessResponse({ id: params.id }, 'Venue deleted'));
  });
}
