import path from 'node:path';
import { readFile, writeFile } from 'node:fs/promises';
import process from 'node:process';

import {
  createFootballFieldConfiguration,
  drawField,
  drawFieldVertices,
  drawPathsOnField,
  drawPointsOnField,
  type PathEntry,
  type PointEntry,
} from '@shared/field';

type OverlayFile = {
  points: PointEntry[];
  paths: PathEntry[];
};

type CliArgs = {
  out: string;
  overlay?: string;
  scale?: number;
  padding?: number;
  vertices: boolean;
};

const USAGE = 'usage: render_field --out field.png [--overlay overlay.json] [--scale 0.1] [--padding 50] [--vertices]';

const parseNumberArg = (flag: string, value: string | undefined): number => {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number`);
  }
  return parsed;
};

const parseArgs = (argv: string[]): CliArgs => {
  let out: string | undefined;
  const args: Omit<CliArgs, 'out'> = { vertices: false };
  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    const next = argv[i + 1];
    switch (current) {
      case '--out':
        out = next;
        i += 1;
        break;
      case '--overlay':
        args.overlay = next;
        i += 1;
        break;
      case '--scale':
        args.scale = parseNumberArg(current, next);
        i += 1;
        break;
      case '--padding':
        args.padding = parseNumberArg(current, next);
        i += 1;
        break;
      case '--vertices':
        args.vertices = true;
        break;
      default:
        throw new Error(`unknown argument ${current}\n${USAGE}`);
    }
  }
  if (!out) {
    throw new Error(USAGE);
  }
  return { ...args, out };
};

const asList = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const isPointEntry = (value: unknown): value is PointEntry => value == null || Array.isArray(value);

const loadOverlay = async (file: string): Promise<OverlayFile> => {
  const parsed: unknown = JSON.parse(await readFile(file, 'utf8'));
  if (!parsed || typeof parsed !== 'object') {
    throw new Error(`${file}: expected a JSON object with "points" and/or "paths"`);
  }
  const points = asList('points' in parsed ? parsed.points : undefined).filter(isPointEntry);
  const paths = asList('paths' in parsed ? parsed.paths : undefined).map((entry) =>
    asList(entry).filter(isPointEntry),
  );
  return { points, paths };
};

const main = async () => {
  const args = parseArgs(process.argv.slice(2));
  const config = createFootballFieldConfiguration();
  const geometry = { scale: args.scale, padding: args.padding };

  let canvas = drawField(config, geometry);
  if (args.overlay) {
    const overlay = await loadOverlay(path.resolve(args.overlay));
    canvas = drawPathsOnField(config, overlay.paths, { ...geometry, canvas });
    canvas = drawPointsOnField(config, overlay.points, { ...geometry, canvas });
  }
  if (args.vertices) {
    canvas = drawFieldVertices(config, { ...geometry, canvas, showLabels: true });
  }

  const target = path.resolve(args.out);
  await writeFile(target, canvas.encodePng());
  console.log(`[render-field] wrote ${canvas.width}x${canvas.height} image to ${target}`);
};

main().catch((error: unknown) => {
  console.error('[render-field] failed', error instanceof Error ? error.message : error);
  process.exit(1);
});
