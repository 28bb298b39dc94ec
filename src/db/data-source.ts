import "reflect-metadata";
import { DataSource } from "typeorm";
import { getSettings } from "../config/settings";
import { InterviewSessionRecord } from "./entities/interview-session.entity";

const settings = getSettings();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: settings.DATABASE_URL,
    synchronize: false,
    logging: settings.NODE_ENV === 'development',
    entities: [InterviewSessionRecord],
    migrations: [`${__dirname}/migrations/*.{ts,js}`],
});
