import { z } from 'zod';
import type { Clock } from '../clock';
import { defineMessageRegistry, registerMessage } from '../registry';
import type { MessageBroker, OutgoingMessage } from '../broker';
import { deferred } from '../deferred';

export interface StudentEnrolled {
  type: 'student.enrolled';
  studentId: string;
  courseId: string;
}

export interface StudentWithdrawn {
  type: 'student.withdrawn';
  studentId: string;
  reason: string;
}

export const StudentEnrolledSchema = z.object({
  type: z.literal('student.enrolled'),
  studentId: z.string().min(1),
  courseId: z.string().min(1),
});

export function studentRegistry() {
  return defineMessageRegistry([
    registerMessage<StudentEnrolled>({
      eventType: 'student.enrolled',
      topic: 'A',
      messageType: 'student_enrolled',
      key: (event) => event.studentId,
      schema: StudentEnrolledSchema,
    }),
    registerMessage<StudentWithdrawn>({
      eventType: 'student.withdrawn',
      topic: 'B',
      messageType: 'student_withdrawn',
      key: (event) => event.studentId,
      serialize: (event) => `${event.studentId}:${event.reason}`,
      format: 'text/plain',
    }),
  ]);
}

export function enrolled(studentId: string, courseId = 'course-1'): StudentEnrolled {
  return { type: 'student.enrolled', studentId, courseId };
}

export function withdrawn(studentId: string, reason = 'moved'): StudentWithdrawn {
  return { type: 'student.withdrawn', studentId, reason };
}

export const T0 = new Date('2026-01-05T09:00:00.000Z');

/** Each `now()` returns the previous instant plus `stepMs`, starting at `start`. */
export function steppingClock(start: Date = T0, stepMs = 1_000): Clock & { readonly calls: number } {
  let calls = 0;
  return {
    now: () => new Date(start.getTime() + stepMs * calls++),
    get calls() {
      return calls;
    },
  };
}

/** Broker whose publishes park until released, to hold a cycle open. */
export class GatedBroker implements MessageBroker {
  readonly published: OutgoingMessage[] = [];
  private readonly gate = deferred<void>();
  started = 0;

  async publish(message: OutgoingMessage): Promise<void> {
    this.started++;
    await this.gate.promise;
    this.published.push(message);
  }

  release(): void {
    this.gate.resolve();
  }
}
