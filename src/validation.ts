/**
 * Validation for parsed documents and reader input
 *
 * Re-exports the input schemas and checks the layout invariants of a
 * MotionDocument.
 */

import type { MotionDocument } from './core/motion-document';
import { traverseJoints } from './core/traversal';

export {
  BvhReaderConfigSchema,
  ChannelKindSchema,
  EncodingSchema,
  FilePathSchema,
} from './schemas';

/**
 * Check the channel layout invariants of a document.
 *
 * @returns One message per violated invariant, empty when the document is consistent
 */
export function validateMotionDocument(document: MotionDocument): string[] {
  const issues: string[] = [];

  let index = 0;
  for (const joint of traverseJoints(document.root)) {
    for (const channel of joint.channels) {
      const curve = document.channels[index];
      if (curve && (curve.jointName !== joint.name || curve.channel !== channel)) {
        issues.push(`channels[${index}] is ${curve.jointName}.${curve.channel}, expected ${joint.name}.${channel}`);
      }
      index++;
    }
  }

  if (index !== document.channels.length) {
    issues.push(`document has ${document.channels.length} curves, skeleton declares ${index} channels`);
  }

  document.channels.forEach((curve, i) => {
    if (curve.keys.length !== document.frameCount) {
      issues.push(`channels[${i}] has ${curve.keys.length} keys, expected ${document.frameCount}`);
    }
  });

  return issues;
}
