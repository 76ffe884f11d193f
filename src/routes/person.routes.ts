import express from 'express';
import type { PersonController } from '../controllers/person.controller';

export const createPersonRoutes = (ctrl: PersonController) => {
  const router = express.Router();

  router.get('/', ctrl.getPersons);
  router.post('/', ctrl.createPerson);
  router.put('/', ctrl.updatePerson);
  router.delete('/', ctrl.deletePerson);

  return router;
};
