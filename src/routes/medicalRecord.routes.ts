import express from 'express';
import type { MedicalRecordController } from '../controllers/medicalRecord.controller';

export const createMedicalRecordRoutes = (ctrl: MedicalRecordController) => {
  const router = express.Router();

  router.get('/', ctrl.getMedicalRecords);
  router.post('/', ctrl.createMedicalRecord);
  router.put('/', ctrl.updateMedicalRecord);
  router.delete('/', ctrl.deleteMedicalRecord);

  return router;
};
