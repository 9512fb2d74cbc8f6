import express from "express";
import bodyParser from "body-parser";
import { createApiRouter } from "./api.js";
import { config } from "./config.js";
import { openDatabase } from "./db.js";
import docsRouter from "./web/docsRouter.js";
import { ZoneDetector } from "./zoneDetector.js";
import { ZoneStore } from "./zoneStore.js";
import { startZoneSync } from "./zoneSync.js";

const db = openDatabase(config.dbPath);
const store = new ZoneStore();
const detector = new ZoneDetector(store, {
  defaultState: config.defaultState,
  notFoundMessage: config.notFoundMessage,
});

startZoneSync(db, store, config.zoneSyncMs);

const app = express();

app.use(bodyParser.json());
app.use(createApiRouter({ db, store, detector, allowedRegion: config.allowedRegion }));
app.use("/", docsRouter);

app.listen(config.port, () => console.log(`Server listening on :${config.port} - API docs at http://localhost:${config.port}/admin/api`));
