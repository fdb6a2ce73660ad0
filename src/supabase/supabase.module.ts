// src/supabase/supabase.module.ts
import { Module, Global } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient } from '@supabase/supabase-js';

export const SUPABASE = 'SUPABASE';

/**
 * Service-role client for the gateway tables (channels, contacts,
 * contact_urns, msgs, channel_logs). See supabase/migrations.
 */
@Global()
@Module({
  providers: [
    {
      provide: SUPABASE,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => {
        const url = cfg.get<string>('SUPABASE_URL');
        const serviceKey = cfg.get<string>('SUPABASE_SERVICE_ROLE_KEY');

        if (!url || !serviceKey) {
          throw new Error('SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY not configured');
        }

        return createClient(url, serviceKey, {
          auth: {
            autoRefreshToken: false,
            persistSession: false,
          },
        });
      },
    },
  ],
  exports: [SUPABASE],
})
export class SupabaseModule {}
