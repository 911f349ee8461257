import { Router } from 'express';
import { TrackingController } from '../controllers/tracking';

/**
 * Routes mounted under /api/tracking
 */
export function createTrackingRouter(controller: TrackingController): Router {
  const router = Router();

  // Position reports
  router.post('/location', controller.updateLocation);
  router.post('/destination', controller.reassignDestination);
  router.post('/guide/location', controller.updateGuidePosition);

  // Lifecycle
  router.post('/tourists', controller.registerTourist);
  router.post('/trips', controller.startTrip);
  router.post('/trips/:subjectId/close', controller.closeTrip);

  // Reads
  router.get('/points-of-interest', controller.getPointsOfInterest);
  router.get('/subjects', controller.listSubjects);
  router.get('/subjects/:subjectId', controller.getSubject);
  router.get('/subjects/:subjectId/incidents', controller.listIncidents);
  router.get('/guides/positions', controller.listGuidePositions);
  router.get('/health', controller.getHealthStatus);

  return router;
}
