/**
 * Tracking API Controller
 *
 * REST endpoints for position reports, trip lifecycle and the role-scoped
 * dashboard reads. Validation and authorization live in the ingest service;
 * errors are passed to the error-handling middleware.
 */

import { Request, Response, NextFunction } from 'express';
import { ApiResponse } from '@safetrail/shared';
import { ConnectionRegistry } from '../services/tracking/ConnectionRegistry';
import { LocationIngestService } from '../services/tracking/LocationIngestService';
import { getIdentity } from '../middleware/authenticate';

function respond<T>(res: Response, statusCode: number, data: T): void {
  const body: ApiResponse<T> = { success: true, data };
  res.status(statusCode).json(body);
}

export class TrackingController {
  private ingest: LocationIngestService;
  private registry: ConnectionRegistry;

  constructor(ingest: LocationIngestService, registry: ConnectionRegistry) {
    this.ingest = ingest;
    this.registry = registry;

    // Bind methods to preserve 'this' context
    this.updateLocation = this.updateLocation.bind(this);
    this.reassignDestination = this.reassignDestination.bind(this);
    this.updateGuidePosition = this.updateGuidePosition.bind(this);
    this.registerTourist = this.registerTourist.bind(this);
    this.startTrip = this.startTrip.bind(this);
    this.closeTrip = this.closeTrip.bind(this);
    this.getPointsOfInterest = this.getPointsOfInterest.bind(this);
    this.listSubjects = this.listSubjects.bind(this);
    this.getSubject = this.getSubject.bind(this);
    this.listIncidents = this.listIncidents.bind(this);
    this.listGuidePositions = this.listGuidePositions.bind(this);
    this.getHealthStatus = this.getHealthStatus.bind(this);
  }

  /**
   * Report a tourist position
   * POST /api/tracking/location
   */
  async updateLocation(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.ingest.updateLocation(getIdentity(res), {
        subjectId: req.body?.subjectId,
        latitude: req.body?.latitude,
        longitude: req.body?.longitude,
      });
      respond(res, 200, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Change the destination of the caller's subject
   * POST /api/tracking/destination
   */
  async reassignDestination(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.ingest.reassignDestination(getIdentity(res), {
        subjectId: req.body?.subjectId,
        poiId: req.body?.poiId,
      });
      respond(res, 200, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/tracking/guide/location
   */
  async updateGuidePosition(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const position = await this.ingest.updateGuidePosition(getIdentity(res), {
        latitude: req.body?.latitude,
        longitude: req.body?.longitude,
      });
      respond(res, 200, position);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/tracking/tourists
   */
  async registerTourist(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const subject = await this.ingest.registerTourist(getIdentity(res), { poiId: req.body?.poiId });
      respond(res, 201, subject);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/tracking/trips
   */
  async startTrip(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const subject = await this.ingest.startTrip(getIdentity(res), {
        poiId: req.body?.poiId,
        guideId: req.body?.guideId,
        startingLocation: req.body?.startingLocation,
        modeOfTravel: req.body?.modeOfTravel,
      });
      respond(res, 201, subject);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/tracking/trips/:subjectId/close
   */
  async closeTrip(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const subject = await this.ingest.closeTrip(getIdentity(res), req.params.subjectId);
      respond(res, 200, subject);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Landmark list plus a GeoJSON rendering for map clients
   * GET /api/tracking/points-of-interest
   */
  async getPointsOfInterest(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      respond(res, 200, {
        pointsOfInterest: this.ingest.getPointsOfInterest(),
        geojson: this.ingest.getGeoIndex().toFeatureCollection(),
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/tracking/subjects
   */
  async listSubjects(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      respond(res, 200, await this.ingest.listVisibleSubjects(getIdentity(res)));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/tracking/subjects/:subjectId
   */
  async getSubject(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      respond(res, 200, await this.ingest.getSubjectView(getIdentity(res), req.params.subjectId));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/tracking/subjects/:subjectId/incidents
   */
  async listIncidents(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      respond(res, 200, await this.ingest.listIncidents(getIdentity(res), req.params.subjectId));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/tracking/guides/positions
   */
  async listGuidePositions(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      respond(res, 200, await this.ingest.listGuidePositions(getIdentity(res)));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/tracking/health
   */
  async getHealthStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      respond(res, 200, {
        status: 'healthy',
        connections: this.registry.getStats(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  }
}
