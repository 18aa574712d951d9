import { Router, type Request, type Response } from 'express';
import type { ClusterCapabilities } from '../services/capability.service';
import type { CapabilitySnapshot } from '../types';
import { sendError } from './errors';

// JSON has no undefined; "not yet detected" goes out as null.
function toJson(snapshot: CapabilitySnapshot) {
  return {
    securityPolicy: snapshot.securityPolicy ?? null,
    seccompProfile: snapshot.seccompProfile ?? null,
    serviceMesh: snapshot.serviceMesh ?? null,
    detectedAt: snapshot.detectedAt,
  };
}

export function createCapabilityRoutes(capabilities: ClusterCapabilities): Router {
  const router = Router();

  /**
   * Current flags (no cluster calls)
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json(toJson(capabilities.snapshot()));
  });

  /**
   * Re-run detection
   */
  router.post('/detect', async (_req: Request, res: Response) => {
    try {
      const snapshot = await capabilities.detectAll();
      res.json(toJson(snapshot));
    } catch (error) {
      sendError(res, error, 'Failed to detect capabilities');
    }
  });

  /**
   * PodMonitor presence (looked up on every call)
   */
  router.get('/pod-monitor', async (_req: Request, res: Response) => {
    try {
      const exists = await capabilities.podMonitorExists();
      res.json({ exists });
    } catch (error) {
      sendError(res, error, 'Failed to look up PodMonitor');
    }
  });

  return router;
}
