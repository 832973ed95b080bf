export type TimeInterval = {
  start: Date;
  end: Date;
};

export type TimeSlot = TimeInterval & {
  /** e.g. "Monday, February 2, 2026" */
  date: string;
  /** e.g. "10:00 AM" */
  time: string;
};

export type Availability = {
  totalSlotsAvailable: number;
  daysChecked: number;
  slots: TimeSlot[];
};

export type SlotGenerationResult = {
  freeSlots: TimeSlot[];
  daysChecked: number;
  totalSlots: number;
};
