import type { Course, SegmentDescriptor } from '../engine/types';
import { compileCourse } from '../engine/track';
import type { CompileOptions } from '../engine/track';
import { parseCourseLayout } from './course-loader';
import sunsetStrip from './courses/sunset-strip.json';
import neonCity from './courses/neon-city.json';
import voidTunnel from './courses/void-tunnel.json';
import crystalCavern from './courses/crystal-cavern.json';
import solarHighway from './courses/solar-highway.json';

export interface CourseInfo {
  id: string;
  name: string;
  description: string;
  /** 1 (easy) to 5 (master) */
  difficulty: number;
  layout: readonly SegmentDescriptor[];
}

function toCourseInfo(raw: unknown): CourseInfo {
  const { segments, ...meta } = parseCourseLayout(raw);
  return { ...meta, layout: segments };
}

export const COURSES: readonly CourseInfo[] = [
  sunsetStrip,
  neonCity,
  voidTunnel,
  crystalCavern,
  solarHighway,
].map(toCourseInfo);

export const DEFAULT_COURSE_ID = 'sunset-strip';

export function getCourseInfo(id: string): CourseInfo {
  const info = COURSES.find((c) => c.id === id);
  if (!info) {
    throw new Error(`Unknown course "${id}". Available: ${COURSES.map((c) => c.id).join(', ')}`);
  }
  return info;
}

/** Compile a built-in course by id. */
export function loadCourse(id: string, options?: CompileOptions): Course {
  return compileCourse(getCourseInfo(id).layout, options);
}
