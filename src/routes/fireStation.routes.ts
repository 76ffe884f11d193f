import express from 'express';
import type { FireStationController } from '../controllers/fireStation.controller';
import type { AlertController } from '../controllers/alert.controller';

export const createFireStationRoutes = (ctrl: FireStationController, alerts: AlertController) => {
  const router = express.Router();

  // Residents covered by a station
  router.get('/', alerts.getStationCoverage);
  router.get('/all', ctrl.getFireStations);

  // Address → station mappings
  router.post('/', ctrl.createFireStation);
  router.put('/', ctrl.updateFireStation);
  router.delete('/', ctrl.deleteFireStation);

  return router;
};
