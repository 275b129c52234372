/**
 * recommendation.routes.ts
 * Routes for taste-based recommendations
 */

import express from 'express';
import {
  getCriteria,
  getRecommendations,
  getFormattedRecommendations,
  getPerformanceMetrics,
} from '../controllers/recommendation.controller';
import { rateLimitRequests } from '../middleware/rate-limit.middleware';

const router = express.Router();

router.use(rateLimitRequests());

router.get('/criteria', getCriteria);
router.get('/metrics', getPerformanceMetrics);
router.post('/', getRecommendations);
router.post('/formatted', getFormattedRecommendations);

export default router;
