import { connectDatabase, disconnectDatabase } from '../config/database';
import { config } from '../config';
import { User } from '../models/User';
import { CredentialService } from '../services/credentials';
import { MongoCredentialStore } from '../stores/mongoCredentialStore';

async function seed(): Promise<void> {
  await connectDatabase();

  const existing = await User.findOne({ email: config.admin.email });
  if (existing) {
    console.log(`[Seed] Admin user ${config.admin.email} already exists, skipping.`);
    await disconnectDatabase();
    return;
  }

  const credentials = new CredentialService(new MongoCredentialStore(), config.auth);

  await User.create({
    username: config.admin.email.split('@')[0].replace(/[^A-Za-z0-9_]/g, '_'),
    email: config.admin.email,
    passwordHash: await credentials.hashPassword(config.admin.password),
    role: 'admin',
    isActive: true,
  });

  console.log(`[Seed] Created admin user: ${config.admin.email}`);
  await disconnectDatabase();
}

seed().catch((err) => {
  console.error('[Seed] Failed:', err);
  process.exit(1);
});
