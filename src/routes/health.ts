import express from "express";
import { apiInfo, healthCheck } from "../controllers/healthController";

const router = express.Router();

router.get("/health", healthCheck);
router.get("/api", apiInfo);

export default router;
