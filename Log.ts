import winston from 'winston';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { format as formatMessage } from 'util';
import DailyRotateFile from "winston-daily-rotate-file";
import { z } from 'zod';

const SPLAT = Symbol.for('splat');

type LogMethod = (message: unknown, ...params: unknown[])=>void;

export interface AbstractLogger {
    error: LogMethod;
    warn: LogMethod;
    info: LogMethod;
    debug: LogMethod;
}

const transportDefinition = z.object({
    type: z.string().optional(),
    format: z.enum(['text', 'json', 'console']).optional(),
    level: z.string().optional(),
    filename: z.string().optional(),
    dirname: z.string().optional(),
    datePattern: z.string().optional(),
    maxFiles: z.number().optional(),
});

const loggingDefinition = z.object({
    transports: z.array(transportDefinition),
});

type LoggingDefinition = z.infer<typeof loggingDefinition>;

function envSubst(t:unknown):unknown {
    if (t === null) return t;
    if (Array.isArray(t)) {
        return t.map(envSubst);
    }
    if (typeof t === "object") {
        return Object.fromEntries(
            Object.entries(t).map(
              ([k, v]) => [k, envSubst(v)]
            )
        );
    }
    if (typeof t !== "string") {
        return t;
    }
    return t.replace(/\${([^}]*)}/g, (m:string, p1:string)=>(process.env[p1] || ""));
}

const defaultDefinition = ():LoggingDefinition=> ({
    transports: [
        {
            type: 'file',
            filename: path.join(os.tmpdir(), 'spectra-error.log'),
            level: 'error'
        },
        {
            type: 'file',
            filename: path.join(os.tmpdir(), 'spectra-debug.log'),
            level: 'debug'
        },
        {
            type: 'console',
            level: process.env.LOG_LEVEL || 'info',
            format: 'text',
        }
    ]
});

// Returns the definition and the problem met while loading it, reported once the logger exists
function loadDefinition(env: string): [LoggingDefinition, string|undefined, unknown] {
    const file = process.env.LOGGING_CONFIG || 'logging.json';
    if (!fs.existsSync(file)) {
        return [defaultDefinition(), undefined, undefined];
    }
    try {
        let content = envSubst(JSON.parse(fs.readFileSync(file, 'utf-8')));
        if (content !== null && typeof content === 'object' && Object.prototype.hasOwnProperty.call(content, env)) {
            content = Object.entries(content).find(([k])=>k === env)?.[1];
        }
        const parsed = loggingDefinition.safeParse(content);
        if (!parsed.success) {
            return [defaultDefinition(), "no valid log configuration in " + file + " for env " + env, parsed.error.message];
        }
        return [parsed.data, undefined, undefined];
    } catch(e) {
        return [defaultDefinition(), "unable to read log configuration file: " + file, e];
    }
}

function initServerSide() {
    const timeStamp = winston.format.timestamp({
        format:"YY-MM-DD HH:mm:ss.SSS"
    });
    const colorize = winston.format.colorize({
        all:true
    });
    const printf = winston.format.printf(
        info => {
            const t = info[SPLAT];
            const message = formatMessage(info.message, ...(Array.isArray(t) ? t : []));
            const level = ((info.level || "???") + '').padEnd(5, ' ');
            return `${info.timestamp} ${level} [${info.source}] ${message}`;
        }
    );

    const textFormat = winston.format.combine(printf, timeStamp);
    const colorTextFormat = winston.format.combine(printf, timeStamp, colorize);

    const jsonFormat = winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    );

    const env = process.env.NODE_ENV || 'dev';
    const [definition, problem, cause] = loadDefinition(env);

    const rootLogger = winston.createLogger({
        level: 'debug',
        format: jsonFormat,
        defaultMeta: { service: 'spectra' },
        transports: definition.transports.map(
            (item)=> {
                const {type, format, ...options} = item;
                let formatOpts;
                switch(format) {
                    case 'text':
                        formatOpts = {format: textFormat};
                        break;
                    case 'json':
                        formatOpts = {format: jsonFormat};
                        break;
                    case 'console':
                        formatOpts = {format: colorTextFormat};
                        break;
                }

                switch(((type||'')+'').toLowerCase()) {
                    case 'file':
                        return new winston.transports.File({...options, format: textFormat, ...formatOpts});
                    case 'rotated':
                    case 'rotated-file':
                        return new DailyRotateFile({...options, format: textFormat, ...formatOpts});
                    default:
                        return new winston.transports.Console({...options, format: colorTextFormat, ...formatOpts});
                }
            }),
        exitOnError: false,
    });

    rootLogger.on('error', function (err) { console.error('Winston logging error', err) });

    if (problem !== undefined) {
        setImmediate(()=>logger.error(problem, cause));
    }

    let exited = false;
    process.on('beforeExit', (code) => {
        if (exited) return;
        exited = true;
        logger.debug('Process terminating with code', code);
        rootLogger.end();
    });

    return rootLogger;
}

function childLogger(source:string, opts?: object): AbstractLogger {
    const strip = __filename.replace(/[^/]*$/, '');
    // Remove common part
    let cut = 0;
    while(cut < source.length && cut < strip.length && source[cut] == strip[cut]) {
        cut++;
    }
    source = source.substring(cut);
    // Add ".." for every parent path
    while(cut < strip.length) {
        if (strip[cut++] == '/') {
            source = '../' + source;
        }
    }
    return rootLogger.child({source, ...opts});
}

const rootLogger = initServerSide();

const logger:AbstractLogger = childLogger(__filename);

export default {logger: childLogger};
