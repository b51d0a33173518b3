import { workerData } from 'node:worker_threads';
import { z } from 'zod';
import { OrientationCell } from '../orientation-cell';
import { quaternionOrientation, tiltOrientation } from '../orientation-types';

// Publishes `count` samples as fast as it can. Sample i carries i in every
// field (odd: quaternion, even: tilt) so a reader can tell a torn value.

const { cellBuffer, count } = z
    .object({ cellBuffer: z.instanceof(SharedArrayBuffer), count: z.number().int().positive() })
    .parse(workerData);

const cell = OrientationCell.attach(cellBuffer);
for (let i = 1; i <= count; i++) {
    cell.publish(i % 2 === 1 ? quaternionOrientation(i, i, i, i) : tiltOrientation(i, -i));
}
