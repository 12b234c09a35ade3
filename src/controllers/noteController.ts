import type { Response } from "express";
import type { NoteRecord, NoteRepository } from "../repositories/types";
import type { AuthenticatedContext, ContextHandler } from "../types/context";
import { AppError } from "../utils/appError";
import { renderMarkdown } from "../utils/markdown";
import { errorFlash, redirectTo, renderPage } from "../utils/respond";
import { createNoteSchema, validationOptions } from "./validation";

export interface NoteView {
  id: string;
  title: string;
  html: string;
  createdAt: Date;
}

// Rendered on every request; the HTML is never stored
const toNoteView = async (note: NoteRecord): Promise<NoteView> => ({
  id: note.id,
  title: note.title,
  html: await renderMarkdown(note.body),
  createdAt: note.createdAt,
});

export const createNoteController = ({ notes }: { notes: NoteRepository }) => {
  const renderNewNote = (
    res: Response,
    ctx: AuthenticatedContext,
    error?: string
  ): void => {
    renderPage(
      res,
      ctx,
      "notes/new",
      { title: "New note", flashes: error ? errorFlash(error) : [] },
      error ? 400 : 200
    );
  };

  const listNotes: ContextHandler<AuthenticatedContext> = async (
    ctx,
    _req,
    res
  ) => {
    const owned = await notes.listByOwner(ctx.currentUser.id);
    renderPage(res, ctx, "notes/index", {
      title: "My notes",
      notes: await Promise.all(owned.map(toNoteView)),
    });
  };

  const showNewNote: ContextHandler<AuthenticatedContext> = async (
    ctx,
    _req,
    res
  ) => {
    renderNewNote(res, ctx);
  };

  const createNote: ContextHandler<AuthenticatedContext> = async (
    ctx,
    req,
    res
  ) => {
    const { error, value } = createNoteSchema.validate(
      req.body,
      validationOptions
    );
    if (error) {
      renderNewNote(res, ctx, error.details[0].message);
      return;
    }

    await notes.create({
      title: value.title,
      body: value.body,
      userId: ctx.currentUser.id,
    });

    ctx.session.flash("success", "Note created.");
    redirectTo(res, ctx, "/notes");
  };

  const showNote: ContextHandler<AuthenticatedContext> = async (
    ctx,
    req,
    res
  ) => {
    // Other users' notes are indistinguishable from missing ones
    const note = await notes.findOwned(req.params.id, ctx.currentUser.id);
    if (!note) {
      throw new AppError("Note not found", 404);
    }
    renderPage(res, ctx, "notes/show", {
      title: note.title,
      note: await toNoteView(note),
    });
  };

  return { listNotes, showNewNote, createNote, showNote };
};

export type NoteController = ReturnType<typeof createNoteController>;
