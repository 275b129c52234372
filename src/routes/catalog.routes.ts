import express from 'express';
import { getCatalogStats, reloadCatalog } from '../controllers/catalog.controller';

const router = express.Router();

router.get('/stats', getCatalogStats);
router.post('/reload', reloadCatalog);

export default router;
