// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';
export { AuthService } from './auth.service';

// ── Guards (for use in other feature modules) ───────────────
export { JwtAuthGuard } from './guards';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser } from './decorators';

// ── Interfaces (for typing in other feature modules) ────────
export type { RequestUser } from './interfaces';
