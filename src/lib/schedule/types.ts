export type LineRole = 'heading' | 'content';

export type ClassifiedLine = {
  role: LineRole;
  text: string;
};

export type ScheduleEntry = {
  heading: string;
  content: string;
};

export type ScheduleRow = {
  entries: ScheduleEntry[];
};
