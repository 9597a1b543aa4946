import type { Provider } from '@/types'
import { metadataOf } from '@/lib/providers'
import { useMigration } from '@/hooks/useMigration'

interface ProviderLoginButtonProps {
    provider: Provider
    isMobile: boolean
}

export default function ProviderLoginButton({ provider, isMobile }: ProviderLoginButtonProps) {
    const { controller, state } = useMigration()
    const meta = metadataOf(provider)
    const isLoggedIn = state.auth[meta.wireKey] === true
    const isAppleNative = provider === 'APPLE' && controller.usesNativeAppleLogin()
    const href = isAppleNative ? null : controller.loginHref(provider)
    // Pressing again while waiting re-triggers the native prompt
    const waitingForApple = provider === 'APPLE' && state.applePhase === 'AWAITING_TOKEN'
    const registeringApple = provider === 'APPLE' && state.applePhase === 'REGISTERING'

    const handleLogin = () => {
        if (isAppleNative) {
            controller.loginApple()
            return
        }
        if (!href) {
            alert(`${meta.name} login is not configured.`)
            return
        }
        window.location.href = href
    }

    const handleLogout = () => {
        controller.logout(provider).catch((error: unknown) => {
            console.error(`[auth] Logout from ${meta.wireKey} failed:`, error instanceof Error ? error.message : 'Unknown error')
        })
    }

    if (isLoggedIn) {
        return (
            <div className="relative flex flex-col items-center">
                <img
                    src={meta.icon}
                    alt={`${meta.name} connected`}
                    className={`${isMobile ? 'max-h-6' : 'max-h-10'} w-auto brightness-125`}
                    title={`Logged in to ${meta.name}`}
                />
                <div className="absolute top-0 right-0 w-3 h-3 bg-green-500 rounded-full border border-white" />
                <button
                    onClick={handleLogout}
                    className="mt-1 text-xs text-red-400 hover:text-red-300 transition-colors bg-black bg-opacity-50 px-2 py-1 rounded"
                    title={`Logout from ${meta.name}`}
                >
                    Logout
                </button>
            </div>
        )
    }

    return (
        <button
            onClick={handleLogin}
            disabled={registeringApple}
            className={`
                flex flex-col items-center gap-1 text-xs text-green-400
                ${registeringApple ? 'opacity-50 cursor-not-allowed' : 'hover:opacity-80 transition-opacity'}
            `}
            title={waitingForApple ? 'Waiting for Apple Music, press again to retry' : meta.loginLabel}
        >
            <img
                src={meta.icon}
                alt={meta.name}
                className={`${isMobile ? 'max-h-6' : 'max-h-10'} w-auto opacity-75`}
            />
            {registeringApple ? 'Connecting...' : waitingForApple ? 'Waiting for Apple Music...' : meta.loginLabel}
        </button>
    )
}
