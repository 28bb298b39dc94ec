import { Router, Request, Response } from "express";
import multer from "multer";
import path from "path";
import fs from "fs";
import { z } from "zod";
import { logger } from "../config/logger";
import { getSettings } from "../config/settings";
import { ValidationError, normalizeError } from "../errors/interview-errors";
import { getQueueConfig } from "../queue/queue-config";
import { AudioRecorder } from "../services/audio-capture.service";
import { getInterviewOrchestrator } from "../services/interview-orchestrator.service";
import { pendingQuestion } from "../services/session-controller.service";
import { InterviewSession, SessionStatus } from "../types/interview";

const router = Router();

// Create storage directory if it doesn't exist
const storageDir = getSettings().STORAGE_DIR;
if (!fs.existsSync(storageDir)) {
    fs.mkdirSync(storageDir, { recursive: true });
}

function uniqueSuffix(): string {
    return Date.now() + '-' + Math.round(Math.random() * 1E9);
}

const WAV_MIME_TYPES = new Set(['audio/wav', 'audio/x-wav', 'audio/wave', 'audio/vnd.wave']);

// Configure multer for answer uploads
const storage = multer.diskStorage({
    destination: (req, file, cb) => {
        cb(null, storageDir);
    },
    filename: (req, file, cb) => {
        cb(null, `answer-${uniqueSuffix()}${path.extname(file.originalname) || '.wav'}`);
    }
});

const upload = multer({
    storage: storage,
    limits: {
        fileSize: 25 * 1024 * 1024, // 25MB, the transcription upload limit
    },
    fileFilter: (req, file, cb) => {
        if (WAV_MIME_TYPES.has(file.mimetype)) {
            cb(null, true);
        } else {
            cb(new ValidationError('Only WAV audio is accepted'));
        }
    }
});

// Validation schema for response uploads
const responseSchema = z.object({
    questionId: z.string().min(1, "Question ID is required")
});

const completeSchema = z.object({
    reason: z.enum(['max_questions', 'plateau', 'poor_performance']).optional()
});

/**
 * Session as returned over HTTP. The candidate pool is internal to selection.
 */
function toSessionResponse(session: InterviewSession) {
    const { questionPool, ...rest } = session;
    return {
        ...rest,
        poolSize: questionPool.length,
        pendingQuestion: pendingQuestion(session)
    };
}

function assertAwaitingAnswer(session: InterviewSession, questionId: string) {
    if (session.status !== SessionStatus.InProgress) {
        throw new ValidationError(`Session is ${session.status}, not accepting answers`);
    }
    const pending = pendingQuestion(session);
    if (!pending || pending.id !== questionId) {
        throw new ValidationError(`Question ${questionId} is not awaiting an answer`, {
            pendingQuestionId: pending?.id ?? null
        });
    }
}

function sendError(res: Response, error: unknown, context: object) {
    const appError = normalizeError(error);
    if (appError.statusCode >= 500) {
        logger.error({ ...context, error: appError.message, code: appError.code }, 'Request failed');
    } else {
        logger.warn({ ...context, error: appError.message, code: appError.code }, 'Request rejected');
    }
    res.status(appError.statusCode).json(appError.toJSON());
}

/**
 * POST /sessions
 *
 * Body: { candidateId, jobTitle, jobDescription, keySkills?, experienceLevel? }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const session = await getInterviewOrchestrator().createSession(req.body);
        res.status(201).json(toSessionResponse(session));
    } catch (error) {
        sendError(res, error, { route: 'create session' });
    }
});

router.get('/:id', async (req: Request, res: Response) => {
    try {
        const session = await getInterviewOrchestrator().getSession(req.params.id);
        res.json(toSessionResponse(session));
    } catch (error) {
        sendError(res, error, { route: 'get session', sessionId: req.params.id });
    }
});

router.post('/:id/start', async (req: Request, res: Response) => {
    try {
        const session = await getInterviewOrchestrator().startSession(req.params.id);
        res.json(toSessionResponse(session));
    } catch (error) {
        sendError(res, error, { route: 'start session', sessionId: req.params.id });
    }
});

router.post('/:id/pause', async (req: Request, res: Response) => {
    try {
        const session = await getInterviewOrchestrator().pauseSession(req.params.id);
        res.json(toSessionResponse(session));
    } catch (error) {
        sendError(res, error, { route: 'pause session', sessionId: req.params.id });
    }
});

router.post('/:id/resume', async (req: Request, res: Response) => {
    try {
        const session = await getInterviewOrchestrator().resumeSession(req.params.id);
        res.json(toSessionResponse(session));
    } catch (error) {
        sendError(res, error, { route: 'resume session', sessionId: req.params.id });
    }
});

router.post('/:id/cancel', async (req: Request, res: Response) => {
    try {
        const session = await getInterviewOrchestrator().cancelSession(req.params.id);
        res.json(toSessionResponse(session));
    } catch (error) {
        sendError(res, error, { route: 'cancel session', sessionId: req.params.id });
    }
});

router.post('/:id/complete', async (req: Request, res: Response) => {
    try {
        const { reason } = completeSchema.parse(req.body ?? {});
        const session = await getInterviewOrchestrator().completeSession(req.params.id, reason);
        res.json(toSessionResponse(session));
    } catch (error) {
        sendError(res, error, { route: 'complete session', sessionId: req.params.id });
    }
});

/**
 * GET /sessions/:id/next-question
 *
 * Returns { done: false, question } or { done: true, reason, metrics }
 */
router.get('/:id/next-question', async (req: Request, res: Response) => {
    try {
        const result = await getInterviewOrchestrator().nextQuestion(req.params.id);
        res.json(result);
    } catch (error) {
        sendError(res, error, { route: 'next question', sessionId: req.params.id });
    }
});

router.get('/:id/questions/:questionId/speech', async (req: Request, res: Response) => {
    try {
        const audio = await getInterviewOrchestrator().synthesizeQuestion(req.params.id, req.params.questionId);
        res.type('audio/mpeg').send(audio);
    } catch (error) {
        sendError(res, error, {
            route: 'question speech',
            sessionId: req.params.id,
            questionId: req.params.questionId
        });
    }
});

/**
 * POST /sessions/:id/responses
 *
 * Multipart upload: `audio` (WAV) and `questionId`.
 * The answer is scored in the background; returns 202 with the queue job id.
 */
router.post('/:id/responses', upload.single('audio'), async (req: Request, res: Response) => {
    const file = req.file;
    try {
        if (!file) {
            throw new ValidationError('An audio file is required');
        }
        const { questionId } = responseSchema.parse(req.body);

        const session = await getInterviewOrchestrator().getSession(req.params.id);
        assertAwaitingAnswer(session, questionId);

        const jobId = await getQueueConfig().enqueueResponse({
            sessionId: session.id,
            questionId,
            audioPath: file.path
        });

        res.status(202).json({ jobId, sessionId: session.id, questionId, status: 'queued' });
    } catch (error) {
        if (file) {
            fs.promises.unlink(file.path).catch(unlinkError => {
                logger.warn({ path: file.path, error: String(unlinkError) }, 'Could not remove rejected upload');
            });
        }
        sendError(res, error, { route: 'submit response', sessionId: req.params.id });
    }
});

/**
 * POST /sessions/:id/responses/stream?questionId=...
 *
 * Raw mono 16-bit PCM body at SAMPLE_RATE, recorded for at most
 * RECORDING_TIMEOUT_SEC. Stored as WAV and queued like an upload.
 */
router.post('/:id/responses/stream', async (req: Request, res: Response) => {
    let audioPath: string | null = null;
    try {
        const { questionId } = responseSchema.parse(req.query);

        const session = await getInterviewOrchestrator().getSession(req.params.id);
        assertAwaitingAnswer(session, questionId);

        const recording = await AudioRecorder.create().record(req);
        // audio past the recording limit is discarded
        req.resume();
        if (recording.pcm.length === 0) {
            throw new ValidationError('No audio was received');
        }

        audioPath = path.join(storageDir, `answer-${uniqueSuffix()}.wav`);
        await fs.promises.writeFile(audioPath, recording.wav);

        const jobId = await getQueueConfig().enqueueResponse({
            sessionId: session.id,
            questionId,
            audioPath
        });

        res.status(202).json({
            jobId,
            sessionId: session.id,
            questionId,
            durationSec: recording.durationSec,
            status: 'queued'
        });
    } catch (error) {
        const written = audioPath;
        if (written) {
            fs.promises.unlink(written).catch(unlinkError => {
                logger.warn({ path: written, error: String(unlinkError) }, 'Could not remove rejected recording');
            });
        }
        sendError(res, error, { route: 'stream response', sessionId: req.params.id });
    }
});

router.get('/:id/should-end', async (req: Request, res: Response) => {
    try {
        const decision = await getInterviewOrchestrator().shouldEnd(req.params.id);
        res.json(decision);
    } catch (error) {
        sendError(res, error, { route: 'should end', sessionId: req.params.id });
    }
});

router.get('/:id/analysis', async (req: Request, res: Response) => {
    try {
        const analysis = await getInterviewOrchestrator().getAnalysis(req.params.id);
        res.json(analysis);
    } catch (error) {
        sendError(res, error, { route: 'session analysis', sessionId: req.params.id });
    }
});

export { router as sessionRoutes };
