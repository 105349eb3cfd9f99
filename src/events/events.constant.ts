export const EVENTS = {
  // matching run events
  MATCHING_COMPLETED: 'matching.completed',
  MATCHING_FAILED: 'matching.failed',
  // student events
  STUDENT_SAVED: 'student.saved',
};
