import express from "express";
import type { NoteController } from "../controllers/noteController";
import { requireLogin } from "../middleware/authMiddleware";

export const createNoteRoutes = (controller: NoteController) => {
  const router = express.Router();

  router.get("/", requireLogin(controller.listNotes));

  // Placed before /:id so "new" is not taken as an id
  router
    .route("/new")
    .get(requireLogin(controller.showNewNote))
    .post(requireLogin(controller.createNote));

  router.get("/:id", requireLogin(controller.showNote));

  return router;
};
