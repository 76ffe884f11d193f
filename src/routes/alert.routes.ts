import express from 'express';
import type { AlertController } from '../controllers/alert.controller';

export const createAlertRoutes = (ctrl: AlertController) => {
  const router = express.Router();

  // Address based
  router.get('/childAlert', ctrl.getChildAlert);
  router.get('/fire', ctrl.getFireAlert);

  // Person based
  router.get('/personInfolastName', ctrl.getPersonInfo);
  router.get('/communityEmail', ctrl.getCommunityEmail);

  // Station based
  router.get('/phoneAlert', ctrl.getPhoneAlert);
  router.get('/flood/stations', ctrl.getFloodStations);

  return router;
};
