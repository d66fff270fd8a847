import dotenv from 'dotenv';
import mongoose from 'mongoose';
import { loadConfig } from '../config';
import { MongoSchedulingStore } from '../repositories/MongoSchedulingStore';
import { SlotCalendar } from '../services/slotCalendar';
import { StaffService } from '../services/staffService';

// Persists every configured admin id as an administrator. Idempotent; request handling never
// consults ADMIN_IDS, only the stored flags.
export async function bootstrapAdmins(staff: StaffService, adminIds: number[]): Promise<number> {
  let granted = 0;
  for (const chatId of adminIds) {
    const result = await staff.grantAdmin(chatId);
    if (result.ok) {
      granted++;
    } else {
      console.warn(`Skipping admin id ${chatId}: ${result.message}`);
    }
  }
  return granted;
}

async function main() {
  dotenv.config();
  const config = loadConfig();
  await mongoose.connect(config.MONGODB_URI);
  console.log('Connected to DB:', mongoose.connection.name);

  const store = new MongoSchedulingStore({ transactions: config.MONGODB_TRANSACTIONS });
  const calendar = new SlotCalendar(store, {
    slotTimes: config.SLOT_TIMES,
    defaultWorkdays: config.DEFAULT_WORKDAYS,
    defaultTimeZone: config.TIME_ZONE,
  });
  const granted = await bootstrapAdmins(new StaffService(store, calendar), config.ADMIN_IDS);
  console.log(`Admins ensured: ${granted} of ${config.ADMIN_IDS.length}`);
}

if (require.main === module) {
  main()
    .catch(err => {
      console.error('bootstrapAdmins failed:', err);
      process.exitCode = 1;
    })
    .finally(() => mongoose.disconnect());
}
