/**
 * Training Content Service
 *
 * Programs belong to a product and videos to a program; both are shown in
 * ascending order_index, ties broken by id.
 */

import { asc, eq } from 'drizzle-orm';
import type { Database } from '../db/database.js';
import {
    trainingPrograms,
    trainingVideos,
    type TrainingProgramRecord,
    type TrainingVideoRecord,
} from '../db/schema.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('training');

export interface VideoView {
    id: number;
    title: string;
    video_url: string;
    description: string | null;
    order_index: number;
    duration_seconds: number | null;
}

export interface ProgramView {
    id: number;
    title: string;
    description: string | null;
    order_index: number;
    videos: VideoView[];
}

export interface NewProgram {
    productId: number;
    title: string;
    description?: string | null;
    orderIndex?: number;
}

export interface NewVideo {
    programId: number;
    title: string;
    videoUrl: string;
    description?: string | null;
    orderIndex?: number;
    durationSeconds?: number | null;
}

export function toVideoView(video: TrainingVideoRecord): VideoView {
    return {
        id: video.id,
        title: video.title,
        video_url: video.videoUrl,
        description: video.description,
        order_index: video.orderIndex,
        duration_seconds: video.durationSeconds,
    };
}

/**
 * Programs of a product with their videos embedded
 */
export async function listPrograms(db: Database, productId: number): Promise<ProgramView[]> {
    const programs = await db.query.trainingPrograms.findMany({
        where: eq(trainingPrograms.productId, productId),
        orderBy: [asc(trainingPrograms.orderIndex), asc(trainingPrograms.id)],
        with: {
            videos: {
                orderBy: [asc(trainingVideos.orderIndex), asc(trainingVideos.id)],
            },
        },
    });

    return programs.map((program) => ({
        id: program.id,
        title: program.title,
        description: program.description,
        order_index: program.orderIndex,
        videos: program.videos.map(toVideoView),
    }));
}

export async function listProgramVideos(db: Database, programId: number): Promise<VideoView[]> {
    const videos = await db
        .select()
        .from(trainingVideos)
        .where(eq(trainingVideos.programId, programId))
        .orderBy(asc(trainingVideos.orderIndex), asc(trainingVideos.id));

    return videos.map(toVideoView);
}

export async function findProgram(db: Database, programId: number): Promise<TrainingProgramRecord | undefined> {
    const [program] = await db
        .select()
        .from(trainingPrograms)
        .where(eq(trainingPrograms.id, programId))
        .limit(1);

    return program;
}

export async function createProgram(db: Database, input: NewProgram): Promise<TrainingProgramRecord> {
    const [program] = await db
        .insert(trainingPrograms)
        .values({
            productId: input.productId,
            title: input.title,
            description: input.description ?? null,
            orderIndex: input.orderIndex ?? 0,
        })
        .returning();

    log.info({ programId: program.id, productId: program.productId }, 'Training program created');
    return program;
}

export async function createVideo(db: Database, input: NewVideo): Promise<TrainingVideoRecord> {
    const [video] = await db
        .insert(trainingVideos)
        .values({
            programId: input.programId,
            title: input.title,
            videoUrl: input.videoUrl,
            description: input.description ?? null,
            orderIndex: input.orderIndex ?? 0,
            durationSeconds: input.durationSeconds ?? null,
        })
        .returning();

    log.info({ videoId: video.id, programId: video.programId }, 'Training video created');
    return video;
}
