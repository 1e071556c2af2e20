import { Router } from 'express';
import { z } from 'zod';
import { CreateNoteUseCase } from '../../../application/notes/createNote.js';
import { UpdateNoteUseCase } from '../../../application/notes/updateNote.js';
import { DeleteNoteUseCase } from '../../../application/notes/deleteNote.js';
import { NoteQueries } from '../../../application/notes/queries.js';
import { NOTE_CONTENT_MAX_LENGTH, NOTE_ID_MAX, NOTE_TITLE_MAX_LENGTH } from '../../../domain/notes/note.js';
import type { NoteRepo } from '../../db/noteRepo.js';
import type { UserRepo } from '../../db/userRepo.js';
import { authMiddleware, currentUser } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /notes:
 *   get:
 *     tags: [Notes]
 *     summary: List the caller's notes, newest first
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/Note' }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Notes]
 *     summary: Create a note
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title, content]
 *             properties:
 *               title: { type: string }
 *               content: { type: string }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Note' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /notes/{id}:
 *   put:
 *     tags: [Notes]
 *     summary: Replace a note's title and content
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title, content]
 *             properties:
 *               title: { type: string }
 *               content: { type: string }
 *     responses:
 *       200:
 *         description: Updated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Note' }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Note not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Notes]
 *     summary: Delete a note
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: Deleted }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Note not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const noteBodySchema = z.object({
  title: z.string().max(NOTE_TITLE_MAX_LENGTH),
  content: z.string().max(NOTE_CONTENT_MAX_LENGTH),
});

const noteParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(NOTE_ID_MAX),
});

export interface NotesRoutesDeps {
  userRepo: UserRepo;
  noteRepo: NoteRepo;
  jwtSecret: string;
}

export function createNotesRoutes({ userRepo, noteRepo, jwtSecret }: NotesRoutesDeps) {
  const router = Router();
  const createNoteUseCase = new CreateNoteUseCase(noteRepo);
  const updateNoteUseCase = new UpdateNoteUseCase(noteRepo);
  const deleteNoteUseCase = new DeleteNoteUseCase(noteRepo);
  const queries = new NoteQueries(noteRepo);

  router.use('/notes', authMiddleware(userRepo, jwtSecret));

  router.get(
    '/notes',
    asyncHandler(async (req, res) => {
      const notes = await queries.listNotes(currentUser(req).email);
      res.status(200).json(notes);
    })
  );

  router.post(
    '/notes',
    validate({ body: noteBodySchema }),
    asyncHandler(async (req, res) => {
      const body = noteBodySchema.parse(req.body);
      const note = await createNoteUseCase.execute({
        ownerEmail: currentUser(req).email,
        ...body,
      });
      res.status(201).json(note);
    })
  );

  router.put(
    '/notes/:id',
    validate({ body: noteBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = noteParamsSchema.parse(req.params);
      const body = noteBodySchema.parse(req.body);
      const note = await updateNoteUseCase.execute({
        ownerEmail: currentUser(req).email,
        noteId: id,
        ...body,
      });
      res.status(200).json(note);
    })
  );

  router.delete(
    '/notes/:id',
    asyncHandler(async (req, res) => {
      const { id } = noteParamsSchema.parse(req.params);
      await deleteNoteUseCase.execute({ ownerEmail: currentUser(req).email, noteId: id });
      res.status(200).json({ message: 'deleted' });
    })
  );

  return router;
}
