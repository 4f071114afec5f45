export * from './appointment.dto';
export * from './params.dto';
export * from './schedule.dto';
