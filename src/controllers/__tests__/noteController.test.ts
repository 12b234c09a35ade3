import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Express } from "express";
import {
  createTestApp,
  logIn,
  registerUser,
} from "../../__tests__/helpers/testApp";
import type {
  InMemoryNoteRepository,
  InMemoryUserRepository,
} from "../../__tests__/helpers/inMemoryRepositories";
import type { UserRecord } from "../../repositories/types";

describe("note routes", () => {
  let app: Express;
  let users: InMemoryUserRepository;
  let notes: InMemoryNoteRepository;
  let alice: UserRecord;

  beforeEach(async () => {
    ({ app, users, notes } = createTestApp());
    alice = await registerUser(users, "alice", "secret");
  });

  const aliceAgent = async () => {
    const agent = request.agent(app);
    await logIn(agent, "alice", "secret");
    return agent;
  };

  describe("anonymous access", () => {
    it.each([
      ["get", "/notes"],
      ["get", "/notes/new"],
      ["post", "/notes/new"],
      ["get", "/notes/note-1"],
    ] as const)("%s %s redirects to log in", async (method, path) => {
      const spies = [
        vi.spyOn(notes, "listByOwner"),
        vi.spyOn(notes, "create"),
        vi.spyOn(notes, "findOwned"),
      ];

      const res = await request(app)[method](path);

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe("/log_in");
      for (const spy of spies) {
        expect(spy).not.toHaveBeenCalled();
      }
    });

    it("does not repeat the log-in prompt for repeated hits", async () => {
      const agent = request.agent(app);
      await agent.get("/notes");
      const second = await agent.get("/notes/new");
      const res = await agent.get("/log_in");

      expect(second.headers["set-cookie"]).toBeUndefined();
      expect(res.text.split("Please log in to access this page.")).toHaveLength(2);
    });

    it("asks the visitor to log in", async () => {
      const agent = request.agent(app);
      await agent.get("/notes");

      const res = await agent.get("/log_in");

      expect(res.text).toContain(
        '<div class="flash flash-info">Please log in to access this page.</div>'
      );
    });
  });

  describe("creating notes", () => {
    it("renders the form", async () => {
      const agent = await aliceAgent();

      const res = await agent.get("/notes/new");

      expect(res.status).toBe(200);
      expect(res.text).toContain("<h1>New note</h1>");
    });

    it("stores a note owned by the current user", async () => {
      const agent = await aliceAgent();

      const res = await agent
        .post("/notes/new")
        .type("form")
        .send({ title: "Groceries", body: "- milk\n- eggs" });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe("/notes");
      expect(notes.rows).toHaveLength(1);
      expect(notes.rows[0]).toMatchObject({
        title: "Groceries",
        body: "- milk\n- eggs",
        userId: alice.id,
      });
    });

    it("accepts a note without a body", async () => {
      const agent = await aliceAgent();

      await agent.post("/notes/new").type("form").send({ title: "Empty" });

      expect(notes.rows[0]).toMatchObject({ title: "Empty", body: "" });
    });

    it("requires a title", async () => {
      const agent = await aliceAgent();

      const res = await agent
        .post("/notes/new")
        .type("form")
        .send({ title: "", body: "orphan body" });

      expect(res.status).toBe(400);
      expect(res.text).toContain(
        '<div class="flash flash-error">Title is required</div>'
      );
      expect(res.text).not.toContain("orphan body");
      expect(notes.rows).toHaveLength(0);
    });
  });

  it("rejects a body over the size limit as too large", async () => {
    const agent = await aliceAgent();
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const res = await agent
      .post("/notes/new")
      .type("form")
      .send({ title: "Novel", body: "a".repeat(2_000_000) });

    expect(res.status).toBe(413);
    expect(res.text).toContain('<p class="error-message">Note is too large</p>');
    expect(notes.rows).toHaveLength(0);
    expect(logged).not.toHaveBeenCalled();
  });

  it("reports a body in an unsupported charset as a client error", async () => {
    const agent = await aliceAgent();
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const res = await agent
      .post("/notes/new")
      .set("Content-Type", "application/x-www-form-urlencoded; charset=koi8-u")
      .send("title=x");

    expect(res.status).toBe(415);
    expect(notes.rows).toHaveLength(0);
    expect(logged).not.toHaveBeenCalled();
  });

  describe("listing notes", () => {
    it("renders each body as markdown, newest first", async () => {
      const agent = await aliceAgent();
      await agent
        .post("/notes/new")
        .type("form")
        .send({ title: "Groceries", body: "- milk\n- eggs" });
      await agent
        .post("/notes/new")
        .type("form")
        .send({ title: "Ideas", body: "**bold** plan" });

      const res = await agent.get("/notes");

      expect(res.status).toBe(200);
      expect(res.text).toContain(
        '<div class="flash flash-success">Note created.</div>'
      );
      expect(res.text).toContain("<li>milk</li>");
      expect(res.text).toContain("<p><strong>bold</strong> plan</p>");
      expect(res.text.indexOf("Ideas")).toBeLessThan(
        res.text.indexOf("Groceries")
      );
    });

    it("escapes titles", async () => {
      await notes.create({
        title: "<b>loud</b>",
        body: "",
        userId: alice.id,
      });
      const agent = await aliceAgent();

      const res = await agent.get("/notes");

      expect(res.text).toContain("&lt;b&gt;loud&lt;/b&gt;");
    });

    it("never shows another user's notes", async () => {
      await notes.create({
        title: "Alice secret",
        body: "diary",
        userId: alice.id,
      });
      await registerUser(users, "bob", "hunter2");
      const agent = request.agent(app);
      await logIn(agent, "bob", "hunter2");

      const res = await agent.get("/notes");

      expect(res.status).toBe(200);
      expect(res.text).toContain('<p class="empty">You have no notes yet.</p>');
      expect(res.text).not.toContain("Alice secret");
    });
  });

  describe("showing a note", () => {
    it("renders the owner's note", async () => {
      const note = await notes.create({
        title: "Recipe",
        body: "# Pancakes",
        userId: alice.id,
      });
      const agent = await aliceAgent();

      const res = await agent.get(`/notes/${note.id}`);

      expect(res.status).toBe(200);
      expect(res.text).toContain('<h1 class="note-title">Recipe</h1>');
      expect(res.text).toContain("<h1>Pancakes</h1>");
    });

    it("answers 404 for another user's note", async () => {
      const note = await notes.create({
        title: "Alice secret",
        body: "diary",
        userId: alice.id,
      });
      await registerUser(users, "bob", "hunter2");
      const agent = request.agent(app);
      await logIn(agent, "bob", "hunter2");

      const res = await agent.get(`/notes/${note.id}`);

      expect(res.status).toBe(404);
      expect(res.text).toContain('<p class="error-message">Note not found</p>');
      expect(res.text).not.toContain("diary");
    });
  });

  it("answers 404 for unknown pages", async () => {
    const res = await request(app).get("/nowhere");

    expect(res.status).toBe(404);
    expect(res.text).toContain('<p class="error-message">Page not found</p>');
  });
});
