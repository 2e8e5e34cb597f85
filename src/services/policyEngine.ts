/**
 * Policy engine module.
 * Decides whether a publish attempt may go ahead and records it once the
 * channel post has succeeded. Checks run strictly in this order and the first
 * failure wins:
 *
 * 1. ban (per account id)
 * 2. cooldown (global, since the latest event of anyone)
 * 3. daily quota (global, per cycle starting at the reset hour)
 *
 * The check and the record step are separate store transactions. Two attempts
 * racing each other can both pass the quota check unless `serializePublishes`
 * is on, which runs the whole sequence under a {@link PublishLock}.
 *
 * @module services/policyEngine
 */

import { type DateTime, Duration } from "luxon";
import type {
	BanOutcome,
	MessageKind,
	PublishDecision,
	PublishOutcome,
} from "../types";
import type { Clock } from "../utils/clock";
import { DeliveryError, StorageError, ValidationError } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";
import type { EventStore } from "./eventStore";
import { PublishLock } from "./publishLock";
import { cycleStart, nextCycleStart } from "./timeWindows";

export interface PolicyOptions {
	dailyLimit: number;
	resetHour: number;
	timezone: string;
	cooldownMinutes: number;
	adminIds: readonly number[];
	serializePublishes: boolean;
}

export interface PublishRequest {
	userId: number;
	username: string;
	kind: MessageKind;
}

export interface BanRequest {
	subjectUserId: number;
	subjectName: string;
	issuerId: number;
	issuerName: string;
	durationHours: number;
	reason?: string;
}

export interface QuotaStatus {
	used: number;
	limit: number;
	remaining: number;
	cycleStart: DateTime;
	nextReset: DateTime;
}

export class PolicyEngine {
	private readonly lock = new PublishLock();
	private readonly cooldown: Duration;

	constructor(
		private readonly store: EventStore,
		private readonly options: PolicyOptions,
		private readonly clock: Clock,
	) {
		this.cooldown = Duration.fromObject({ minutes: options.cooldownMinutes });
	}

	now(): DateTime {
		return this.clock.now().setZone(this.options.timezone);
	}

	currentCycleStart(): DateTime {
		return cycleStart(this.now(), this.options.resetHour);
	}

	/**
	 * Evaluates ban, cooldown and quota for `userId`, in that order.
	 * Performs no writes.
	 */
	checkPublish(userId: number): PublishDecision {
		const now = this.now();

		const ban = this.store.activeBan(userId);
		if (ban) {
			return {
				outcome: "DENY",
				denial: {
					reason: "BANNED",
					remaining: ban.banUntil.diff(now),
					banReason: ban.reason,
					issuer: ban.issuerDisplayName,
					until: ban.banUntil,
				},
			};
		}

		const latest = this.store.latestEventTime();
		if (latest) {
			const availableAt = latest.plus(this.cooldown);
			if (now.toMillis() < availableAt.toMillis()) {
				return {
					outcome: "DENY",
					denial: {
						reason: "TOO_SOON",
						remaining: availableAt.diff(now),
						availableAt,
					},
				};
			}
		}

		const used = this.store.countSince(cycleStart(now, this.options.resetHour));
		if (used >= this.options.dailyLimit) {
			return {
				outcome: "DENY",
				denial: {
					reason: "QUOTA_EXCEEDED",
					used,
					limit: this.options.dailyLimit,
					nextCycleStart: nextCycleStart(now, this.options.resetHour),
				},
			};
		}

		return { outcome: "ALLOW", used };
	}

	/** Records a publish that has already been delivered */
	recordPublish(username: string, kind: MessageKind): number {
		return this.store.recordForward(username, kind, this.now());
	}

	/**
	 * Full publish sequence: check, deliver, record. `deliver` performs the
	 * channel post; if it throws, nothing is recorded and a
	 * {@link DeliveryError} is raised.
	 *
	 * @example
	 * ```typescript
	 * const outcome = await engine.publish(
	 *   { userId: 42, username: '@alice', kind: 'photo' },
	 *   () => publisher.publish(post),
	 * );
	 * if (outcome.status === 'denied') render(outcome.denial);
	 * ```
	 */
	async publish(
		request: PublishRequest,
		deliver: () => Promise<void>,
	): Promise<PublishOutcome> {
		if (this.options.serializePublishes) {
			return this.lock.runExclusive(() => this.publishOnce(request, deliver));
		}
		return this.publishOnce(request, deliver);
	}

	private async publishOnce(
		request: PublishRequest,
		deliver: () => Promise<void>,
	): Promise<PublishOutcome> {
		const decision = this.checkPublish(request.userId);
		if (decision.outcome === "DENY") {
			StructuredLogger.logUserAction("Publish denied", {
				userId: request.userId,
				username: request.username,
				operation: "publish",
				reason: decision.denial.reason,
			});
			return { status: "denied", denial: decision.denial };
		}

		try {
			await deliver();
		} catch (error) {
			throw new DeliveryError(error);
		}

		const eventId = this.recordPublish(request.username, request.kind);
		return {
			status: "published",
			eventId,
			remaining: Math.max(0, this.options.dailyLimit - decision.used - 1),
		};
	}

	quotaStatus(): QuotaStatus {
		const now = this.now();
		const start = cycleStart(now, this.options.resetHour);
		const used = this.store.countSince(start);
		return {
			used,
			limit: this.options.dailyLimit,
			remaining: Math.max(0, this.options.dailyLimit - used),
			cycleStart: start,
			nextReset: nextCycleStart(now, this.options.resetHour),
		};
	}

	/**
	 * Deletes every event of the current cycle. Not undoable.
	 *
	 * @returns Number of events deleted
	 */
	resetToday(): number {
		return this.store.deleteSince(this.currentCycleStart());
	}

	isAdmin(userId: number): boolean {
		return this.options.adminIds.includes(userId);
	}

	/**
	 * Bans a user for a whole number of hours. Administrators are immune and
	 * leave the store untouched.
	 *
	 * @throws {ValidationError} when the duration is not a positive integer
	 */
	banUser(request: BanRequest): BanOutcome {
		if (!Number.isInteger(request.durationHours) || request.durationHours < 1) {
			throw new ValidationError(
				"Ban duration must be a positive whole number of hours.",
				{ durationHours: request.durationHours },
			);
		}

		if (this.isAdmin(request.subjectUserId)) {
			StructuredLogger.logSecurityEvent("Ban on administrator rejected", {
				userId: request.subjectUserId,
				operation: "ban",
				issuerId: request.issuerId,
			});
			return { status: "immune", subjectUserId: request.subjectUserId };
		}

		const banId = this.store.createBan({
			subjectUserId: request.subjectUserId,
			subjectName: request.subjectName,
			issuerId: request.issuerId,
			issuerName: request.issuerName,
			durationHours: request.durationHours,
			reason: request.reason,
		});

		const ban = this.store.findBan(banId);
		if (!ban) {
			throw new StorageError(
				"create_ban",
				new Error(`Ban ${banId} missing after insert`),
			);
		}
		return { status: "created", ban };
	}

	/** @returns Number of live bans revoked */
	unbanUser(subjectUserId: number): number {
		return this.store.revokeBan(subjectUserId);
	}
}
