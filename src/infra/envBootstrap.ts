import { config as loadDotenv } from "dotenv";

// Populate process.env from .env before any module reads configuration.
loadDotenv();
