import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_AXIS_MAPPING, parseAxisMapping } from './pose';
import { DEFAULT_FPS } from './presentation';
import { DEFAULT_BAUD_RATE } from './serial-source';

export const USAGE = `Usage: imu-view <device> [options]

Streams orientation telemetry from a serial IMU and tracks its pose.

Options:
  --baud <n>          serial baud rate (default ${DEFAULT_BAUD_RATE})
  --no-rtscts         disable RTS/CTS hardware flow control
  --fps <n>           presentation rate in ticks per second (default ${DEFAULT_FPS})
  --format <f>        auto | quaternion | tilt (default auto)
  --axes <a,b,c>      sensor axis feeding render X,Y,Z (default ${DEFAULT_AXIS_MAPPING.join(',')})
  --in-process        read the port on the main thread instead of a worker
  -q, --quiet         no terminal readout
  -h, --help          show this message`;

const AxisMappingSchema = z.string().transform((value, ctx) => {
    try {
        return parseAxisMapping(value);
    } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
        return z.NEVER;
    }
});

export const ViewerConfigSchema = z.object({
    device: z.string().min(1),
    baudRate: z.coerce.number().int().positive().default(DEFAULT_BAUD_RATE),
    rtscts: z.boolean().default(true),
    fps: z.coerce.number().positive().max(1000).default(DEFAULT_FPS),
    format: z.enum(['auto', 'quaternion', 'tilt']).default('auto'),
    axisMapping: AxisMappingSchema.default(DEFAULT_AXIS_MAPPING.join(',')),
    inProcess: z.boolean().default(false),
    quiet: z.boolean().default(false),
});

export type ViewerConfig = z.infer<typeof ViewerConfigSchema>;

export type CliCommand = { kind: 'usage' } | { kind: 'run'; config: ViewerConfig };

function formatIssues(issues: z.ZodIssue[]): string {
    return issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`).join('; ');
}

function parseRawArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            strict: true,
            options: {
                baud: { type: 'string' },
                'no-rtscts': { type: 'boolean' },
                fps: { type: 'string' },
                format: { type: 'string' },
                axes: { type: 'string' },
                'in-process': { type: 'boolean' },
                quiet: { type: 'boolean', short: 'q' },
                help: { type: 'boolean', short: 'h' },
            },
        });
    } catch (error) {
        // unknown flags, missing option values
        throw new ConfigError(error instanceof Error ? error.message : String(error));
    }
}

export function parseCliArgs(argv: string[]): CliCommand {
    const { values, positionals } = parseRawArgs(argv);
    if (values.help || positionals.length === 0) return { kind: 'usage' };
    if (positionals.length > 1) {
        throw new ConfigError(`Expected a single device path, got ${positionals.length} arguments`);
    }

    const result = ViewerConfigSchema.safeParse({
        device: positionals[0],
        baudRate: values.baud,
        rtscts: !values['no-rtscts'],
        fps: values.fps,
        format: values.format,
        axisMapping: values.axes,
        inProcess: values['in-process'] ?? false,
        quiet: values.quiet ?? false,
    });
    if (!result.success) {
        throw new ConfigError(`Invalid options: ${formatIssues(result.error.issues)}`, result.error.issues);
    }
    return { kind: 'run', config: result.data };
}
